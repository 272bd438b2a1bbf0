// SPDX-License-Identifier: Apache-2.0

import {type AuthorizationAttributes} from './authorization-attributes.js';

export enum Decision {
  DENY = 'Deny',
  ALLOW = 'Allow',
  NO_OPINION = 'NoOpinion',
}

export interface AuthorizationResult {
  decision: Decision;
  reason: string;
}

export interface Authorizer {
  authorize(attributes: AuthorizationAttributes): Promise<AuthorizationResult>;
}
