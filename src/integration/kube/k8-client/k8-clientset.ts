// SPDX-License-Identifier: Apache-2.0

import {
  AuthenticationV1Api,
  AuthorizationV1Api,
  CoreV1Api,
  FlowcontrolApiserverV1Api,
  type KubeConfig,
} from '@kubernetes/client-node';
import * as constants from '../../../core/constants.js';
import {type Clientset, type ResourceDescriptor} from '../clientset.js';
import {type ConfigMaps} from '../resources/config-maps.js';
import {type TokenReviews} from '../resources/token-reviews.js';
import {type SubjectAccessReviews} from '../resources/subject-access-reviews.js';
import {K8ClientConfigMaps} from './resources/k8-client-config-maps.js';
import {K8ClientTokenReviews} from './resources/k8-client-token-reviews.js';
import {K8ClientSubjectAccessReviews} from './resources/k8-client-subject-access-reviews.js';

/**
 * A Kubernetes API wrapper exposing the API groups the adapter needs. Creating one does not contact the server.
 */
export class K8Clientset implements Clientset {
  private readonly k8ConfigMaps: ConfigMaps;
  private readonly k8TokenReviews: TokenReviews;
  private readonly k8SubjectAccessReviews: SubjectAccessReviews;
  private readonly flowControlApi: FlowcontrolApiserverV1Api;

  /**
   * @param config - a KubeConfig whose current context points at the API server
   * @param userAgent - sent with every request when set
   */
  public constructor(
    private readonly config: KubeConfig,
    userAgent?: string,
  ) {
    const coreApi = config.makeApiClient(CoreV1Api);
    const authenticationApi = config.makeApiClient(AuthenticationV1Api);
    const authorizationApi = config.makeApiClient(AuthorizationV1Api);
    this.flowControlApi = config.makeApiClient(FlowcontrolApiserverV1Api);

    if (userAgent) {
      for (const api of [coreApi, authenticationApi, authorizationApi, this.flowControlApi]) {
        api.addInterceptor(options => {
          options.headers = {...options.headers, 'User-Agent': userAgent};
        });
      }
    }

    this.k8ConfigMaps = new K8ClientConfigMaps(coreApi);
    this.k8TokenReviews = new K8ClientTokenReviews(authenticationApi);
    this.k8SubjectAccessReviews = new K8ClientSubjectAccessReviews(authorizationApi);
  }

  public host(): string {
    return this.config.getCurrentCluster()?.server ?? '';
  }

  public kubeConfig(): KubeConfig {
    return this.config;
  }

  public configMaps(): ConfigMaps {
    return this.k8ConfigMaps;
  }

  public tokenReviews(): TokenReviews {
    return this.k8TokenReviews;
  }

  public subjectAccessReviews(): SubjectAccessReviews {
    return this.k8SubjectAccessReviews;
  }

  public flowSchemas(): ResourceDescriptor {
    return {path: constants.FLOW_SCHEMAS_PATH, list: () => this.flowControlApi.listFlowSchema()};
  }

  public priorityLevelConfigurations(): ResourceDescriptor {
    return {
      path: constants.PRIORITY_LEVEL_CONFIGURATIONS_PATH,
      list: () => this.flowControlApi.listPriorityLevelConfiguration(),
    };
  }
}
