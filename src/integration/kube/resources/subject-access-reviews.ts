// SPDX-License-Identifier: Apache-2.0

import {type AuthorizationAttributes} from '../../../core/auth/authorization-attributes.js';

export interface SubjectAccessReviewResult {
  allowed: boolean;
  denied: boolean;
  reason: string;
}

export interface SubjectAccessReviews {
  create(attributes: AuthorizationAttributes): Promise<SubjectAccessReviewResult>;
}
