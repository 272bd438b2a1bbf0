// SPDX-License-Identifier: Apache-2.0

import {type UserInfo} from './user-info.js';

/**
 * The request an authorizer decides on. Resource requests carry `resource`, everything else is a non-resource
 * request identified by its `path`.
 */
export interface AuthorizationAttributes {
  user: UserInfo;
  verb: string;
  path: string;
  namespace?: string;
  apiGroup?: string;
  apiVersion?: string;
  resource?: string;
  subresource?: string;
  name?: string;
}

export function isResourceRequest(attributes: AuthorizationAttributes): boolean {
  return attributes.resource !== undefined && attributes.resource !== '';
}
