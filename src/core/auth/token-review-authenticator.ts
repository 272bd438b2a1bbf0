// SPDX-License-Identifier: Apache-2.0

import crypto from 'node:crypto';
import {AdapterError} from '../errors/adapter-error.js';
import {type Duration} from '../time/duration.js';
import {type TokenReviews} from '../../integration/kube/resources/token-reviews.js';
import {type AuthenticationRequest, type AuthenticationResponse, type Authenticator} from './authenticator.js';
import {TtlCache} from './ttl-cache.js';
import {retryWithBackoff, type WebhookRetryBackoff} from './webhook-retry-backoff.js';

const BEARER_PREFIX = /^bearer\s+/i;

/**
 * Authenticates bearer tokens by asking the API server to review them. Answers are cached for a TTL, keyed by a
 * hash of the token.
 */
export class TokenReviewAuthenticator implements Authenticator {
  private readonly cache: TtlCache<{response?: AuthenticationResponse}>;

  public constructor(
    private readonly tokenReviews: TokenReviews,
    cacheTtl: Duration,
    private readonly retryBackoff: WebhookRetryBackoff,
    private readonly audiences: () => string[] = () => [],
  ) {
    this.cache = new TtlCache(cacheTtl);
  }

  public async authenticate(request: AuthenticationRequest): Promise<AuthenticationResponse | undefined> {
    const token = TokenReviewAuthenticator.bearerToken(request.headers.authorization);
    if (!token) {
      return undefined;
    }

    const audiences = this.audiences();
    const key = crypto.createHash('sha256').update(token).update('\0').update(audiences.join(',')).digest('hex');
    const cached = this.cache.get(key);
    if (cached) {
      return cached.response;
    }

    const result = await retryWithBackoff(() => this.tokenReviews.create(token, audiences), this.retryBackoff);
    if (!result.authenticated || !result.user) {
      if (result.error) {
        throw new AdapterError(`token review failed: ${result.error}`);
      }
      this.cache.set(key, {});
      return undefined;
    }

    const response: AuthenticationResponse = {user: result.user, audiences: result.audiences};
    this.cache.set(key, {response});
    return response;
  }

  private static bearerToken(authorization?: string): string | undefined {
    if (!authorization || !BEARER_PREFIX.test(authorization)) {
      return undefined;
    }
    const token = authorization.replace(BEARER_PREFIX, '').trim();
    return token.length > 0 ? token : undefined;
  }
}
