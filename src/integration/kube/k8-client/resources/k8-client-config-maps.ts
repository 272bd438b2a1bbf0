// SPDX-License-Identifier: Apache-2.0

import {type CoreV1Api} from '@kubernetes/client-node';
import {type ConfigMaps} from '../../resources/config-maps.js';
import {KubeApiResponse} from '../../kube-api-response.js';

export class K8ClientConfigMaps implements ConfigMaps {
  public constructor(private readonly kubeClient: CoreV1Api) {}

  public async read(namespace: string, name: string): Promise<Record<string, string> | undefined> {
    try {
      const {body} = await this.kubeClient.readNamespacedConfigMap(name, namespace);
      return body.data ?? {};
    } catch (error) {
      if (KubeApiResponse.isNotFound(error)) {
        return undefined;
      }
      throw KubeApiResponse.wrap(error, `read configmap ${namespace}/${name}`);
    }
  }
}
