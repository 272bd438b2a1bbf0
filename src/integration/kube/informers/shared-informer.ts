// SPDX-License-Identifier: Apache-2.0

import {type KubernetesObject} from '@kubernetes/client-node';

export type InformerEvent = 'add' | 'update' | 'delete';

export type InformerEventHandler = (event: InformerEvent, object: KubernetesObject) => void;

/**
 * A watch based cache of one resource collection, shared between every consumer of that collection.
 */
export interface SharedInformer {
  readonly path: string;

  /** the cached objects */
  list(): KubernetesObject[];

  addEventHandler(handler: InformerEventHandler): void;

  hasStarted(): boolean;

  start(): Promise<void>;

  stop(): Promise<void>;
}
