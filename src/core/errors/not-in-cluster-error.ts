// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from './adapter-error.js';

export class NotInClusterError extends AdapterError {
  public constructor() {
    super('unable to load in-cluster configuration, KUBERNETES_SERVICE_HOST and KUBERNETES_SERVICE_PORT must be defined');
  }
}
