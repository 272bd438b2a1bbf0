// SPDX-License-Identifier: Apache-2.0

import {type AdapterLogger} from '../../../core/logging/adapter-logger.js';
import {type Duration} from '../../../core/time/duration.js';
import {type Clientset, type ResourceDescriptor} from '../clientset.js';
import {type SharedInformer} from './shared-informer.js';
import {type SharedInformerFactory} from './shared-informer-factory.js';
import {type InformerSourceFactory, K8SharedInformer, listWatchSource} from './k8-shared-informer.js';

export class K8SharedInformerFactory implements SharedInformerFactory {
  private readonly registry = new Map<string, SharedInformer>();

  public constructor(
    private readonly clientset: Clientset,
    public readonly resyncPeriod: Duration,
    private readonly logger: AdapterLogger,
    private readonly sourceFactory: InformerSourceFactory = listWatchSource,
  ) {}

  public informerFor(resource: ResourceDescriptor): SharedInformer {
    let informer = this.registry.get(resource.path);
    if (!informer) {
      const source = this.sourceFactory(this.clientset.kubeConfig(), resource);
      informer = new K8SharedInformer(source, resource.path, this.resyncPeriod, this.logger);
      this.registry.set(resource.path, informer);
    }
    return informer;
  }

  public informers(): SharedInformer[] {
    return [...this.registry.values()];
  }

  /** Starts every informer not yet running. An informer whose first list failed is tried again on the next call. */
  public async start(): Promise<void> {
    const results = await Promise.allSettled(
      this.informers()
        .filter(informer => !informer.hasStarted())
        .map(informer => informer.start()),
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        throw result.reason;
      }
    }
  }

  public async shutdown(): Promise<void> {
    await Promise.all(this.informers().map(informer => informer.stop()));
  }
}
