// SPDX-License-Identifier: Apache-2.0

import * as constants from '../constants.js';
import {AdapterError} from '../errors/adapter-error.js';
import {NotInClusterError} from '../errors/not-in-cluster-error.js';
import {errorMessage} from '../helpers.js';
import {type AdapterLogger} from '../logging/adapter-logger.js';
import {type Clientset} from '../../integration/kube/clientset.js';
import {type ClientsetFactory} from '../../integration/kube/clientset-factory.js';
import {type RestClientConfig, RestClientConfigs} from '../../integration/kube/rest-client-config.js';

export interface DelegatedClientSource {
  /** kubeconfig of the core API server, the in-cluster configuration is used when empty */
  remoteKubeConfigFile: string;
  /** when true a missing configuration leaves the delegate without a client instead of failing */
  remoteKubeConfigFileOptional: boolean;
}

/**
 * Create the client a delegating authenticator or authorizer talks to the core API server with
 * @param source - where the client configuration comes from
 * @param clientsetFactory - builds the clientset
 * @param logger - the logger
 * @param purpose - what the client is for, `authentication` or `authorization`
 * @returns the clientset, or undefined when no configuration was found and that is tolerated
 * @throws AdapterError if no configuration was found and that is not tolerated
 */
export function newDelegatedClient(
  source: DelegatedClientSource,
  clientsetFactory: ClientsetFactory,
  logger: AdapterLogger,
  purpose: string,
): Clientset | undefined {
  let config: RestClientConfig;
  try {
    config = source.remoteKubeConfigFile
      ? RestClientConfigs.fromKubeConfigFile(source.remoteKubeConfigFile)
      : RestClientConfigs.inCluster();
  } catch (error) {
    if (source.remoteKubeConfigFileOptional) {
      if (!(error instanceof NotInClusterError)) {
        logger.warn(`failed to read in-cluster kubeconfig for delegated ${purpose}: ${errorMessage(error)}`);
      }
      return undefined;
    }
    throw new AdapterError(`failed to get delegated ${purpose} kubeconfig: ${errorMessage(error)}`, error);
  }

  // the delegate sits on every request path, so allow it plenty of requests
  return clientsetFactory.newForConfig({
    ...config,
    qps: constants.DELEGATED_CLIENT_QPS,
    burst: constants.DELEGATED_CLIENT_BURST,
  });
}
