// SPDX-License-Identifier: Apache-2.0

import {type Duration} from '../../core/time/duration.js';
import {type Clientset} from './clientset.js';
import {type RestClientConfig} from './rest-client-config.js';
import {type SharedInformerFactory} from './informers/shared-informer-factory.js';

export interface ClientsetFactory {
  /**
   * Create a clientset for the given configuration without contacting the server
   * @param config - the client configuration
   * @throws IllegalArgumentError if the configuration is malformed
   */
  newForConfig(config: RestClientConfig): Clientset;

  /**
   * Create an informer factory whose informers resync at the given period; nothing is started
   * @param clientset - the clientset the informers list and watch through
   * @param resyncPeriod - the resync period
   */
  newSharedInformerFactory(clientset: Clientset, resyncPeriod: Duration): SharedInformerFactory;
}
