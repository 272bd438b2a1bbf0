// SPDX-License-Identifier: Apache-2.0

import {type UserInfo} from '../../../core/auth/user-info.js';

export interface TokenReviewResult {
  authenticated: boolean;
  user?: UserInfo;
  audiences?: string[];
  error?: string;
}

export interface TokenReviews {
  /**
   * Ask the API server who the bearer of a token is
   * @param token - the bearer token
   * @param audiences - the audiences the token must be valid for, the server's own when empty
   */
  create(token: string, audiences: string[]): Promise<TokenReviewResult>;
}
