// SPDX-License-Identifier: Apache-2.0

import type http from 'node:http';
import {type KubeConfig, type KubernetesListObject, type KubernetesObject} from '@kubernetes/client-node';
import {type ConfigMaps} from './resources/config-maps.js';
import {type TokenReviews} from './resources/token-reviews.js';
import {type SubjectAccessReviews} from './resources/subject-access-reviews.js';

export type ListFunction = () => Promise<{response: http.IncomingMessage; body: KubernetesListObject<KubernetesObject>}>;

/**
 * A listable resource collection, identified by its API path.
 */
export interface ResourceDescriptor {
  readonly path: string;
  readonly list: ListFunction;
}

/**
 * The typed API groups of one API server, all sharing the same client configuration.
 */
export interface Clientset {
  host(): string;

  kubeConfig(): KubeConfig;

  configMaps(): ConfigMaps;

  tokenReviews(): TokenReviews;

  subjectAccessReviews(): SubjectAccessReviews;

  flowSchemas(): ResourceDescriptor;

  priorityLevelConfigurations(): ResourceDescriptor;
}
