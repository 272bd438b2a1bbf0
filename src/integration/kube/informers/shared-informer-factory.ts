// SPDX-License-Identifier: Apache-2.0

import {type Duration} from '../../../core/time/duration.js';
import {type ResourceDescriptor} from '../clientset.js';
import {type SharedInformer} from './shared-informer.js';

export interface SharedInformerFactory {
  /** how often every informer redelivers its cache to its handlers */
  readonly resyncPeriod: Duration;

  /**
   * The informer of a resource collection, created on first request. Later requests for the same path return the
   * same informer.
   * @param resource - the resource collection
   */
  informerFor(resource: ResourceDescriptor): SharedInformer;

  informers(): SharedInformer[];

  /** start every informer that has not been started yet */
  start(): Promise<void>;

  shutdown(): Promise<void>;
}
