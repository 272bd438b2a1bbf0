// SPDX-License-Identifier: Apache-2.0

import {
  ADD,
  DELETE,
  ERROR,
  type Informer,
  type KubeConfig,
  type KubernetesObject,
  makeInformer,
  type ObjectCache,
  UPDATE,
} from '@kubernetes/client-node';
import {type AdapterLogger} from '../../../core/logging/adapter-logger.js';
import {type Duration} from '../../../core/time/duration.js';
import {errorMessage} from '../../../core/helpers.js';
import * as constants from '../../../core/constants.js';
import {type ResourceDescriptor} from '../clientset.js';
import {type InformerEvent, type InformerEventHandler, type SharedInformer} from './shared-informer.js';

/** A list-watch of one collection together with its object cache */
export type InformerSource = Informer<KubernetesObject> & ObjectCache<KubernetesObject>;

export type InformerSourceFactory = (kubeConfig: KubeConfig, resource: ResourceDescriptor) => InformerSource;

export const listWatchSource: InformerSourceFactory = (kubeConfig, resource) =>
  makeInformer(kubeConfig, resource.path, resource.list);

/**
 * Wraps a list-watch informer. A watch that fails is restarted after a delay, since the underlying informer
 * does not reconnect by itself.
 */
export class K8SharedInformer implements SharedInformer {
  private readonly handlers: InformerEventHandler[] = [];
  private resyncTimer?: NodeJS.Timeout;
  private restartTimer?: NodeJS.Timeout;
  private started = false;

  public constructor(
    private readonly source: InformerSource,
    public readonly path: string,
    private readonly resyncPeriod: Duration,
    private readonly logger: AdapterLogger,
    private readonly restartDelay: Duration = constants.INFORMER_WATCH_RESTART_DELAY,
  ) {
    this.source.on(ADD, object => this.notify('add', object));
    this.source.on(UPDATE, object => this.notify('update', object));
    this.source.on(DELETE, object => this.notify('delete', object));
    this.source.on(ERROR, (error: unknown) => this.onWatchError(error));
  }

  public list(): KubernetesObject[] {
    return [...this.source.list()];
  }

  public addEventHandler(handler: InformerEventHandler): void {
    this.handlers.push(handler);
  }

  public hasStarted(): boolean {
    return this.started;
  }

  public async start(): Promise<void> {
    if (this.started) {
      return;
    }
    await this.source.start();
    this.started = true;

    if (!this.resyncPeriod.isZero()) {
      this.resyncTimer = setInterval(() => this.resync(), this.resyncPeriod.toMillis());
      this.resyncTimer.unref();
    }
    this.logger.debug(`started informer for ${this.path}`);
  }

  public async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    clearInterval(this.resyncTimer);
    clearTimeout(this.restartTimer);
    this.resyncTimer = undefined;
    this.restartTimer = undefined;
    this.started = false;
    await this.source.stop();
  }

  private onWatchError(error: unknown): void {
    this.logger.warn(`watch of ${this.path} failed, restarting in ${this.restartDelay}: ${errorMessage(error)}`);
    this.scheduleRestart();
  }

  private scheduleRestart(): void {
    if (!this.started || this.restartTimer) {
      return;
    }
    this.restartTimer = setTimeout(() => {
      this.restartTimer = undefined;
      if (!this.started) {
        return;
      }
      this.source.start().then(
        () => this.logger.debug(`restarted watch of ${this.path}`),
        (error: unknown) => this.onWatchError(error),
      );
    }, this.restartDelay.toMillis());
    this.restartTimer.unref();
  }

  private resync(): void {
    for (const object of this.source.list()) {
      this.notify('update', object);
    }
  }

  private notify(event: InformerEvent, object: KubernetesObject): void {
    for (const handler of this.handlers) {
      handler(event, object);
    }
  }
}
