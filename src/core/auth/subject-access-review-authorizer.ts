// SPDX-License-Identifier: Apache-2.0

import {type Duration} from '../time/duration.js';
import {type SubjectAccessReviews} from '../../integration/kube/resources/subject-access-reviews.js';
import {type AuthorizationAttributes} from './authorization-attributes.js';
import {type AuthorizationResult, type Authorizer, Decision} from './authorizer.js';
import {TtlCache} from './ttl-cache.js';
import {retryWithBackoff, type WebhookRetryBackoff} from './webhook-retry-backoff.js';

/**
 * Delegates decisions to the API server through SubjectAccessReviews. Allowed answers are cached for
 * `authorizedTtl`, every other answer for `unauthorizedTtl`.
 */
export class SubjectAccessReviewAuthorizer implements Authorizer {
  private readonly cache: TtlCache<AuthorizationResult>;

  public constructor(
    private readonly subjectAccessReviews: SubjectAccessReviews,
    private readonly authorizedTtl: Duration,
    private readonly unauthorizedTtl: Duration,
    private readonly retryBackoff: WebhookRetryBackoff,
  ) {
    this.cache = new TtlCache(authorizedTtl);
  }

  public async authorize(attributes: AuthorizationAttributes): Promise<AuthorizationResult> {
    const key = JSON.stringify(attributes);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const review = await retryWithBackoff(() => this.subjectAccessReviews.create(attributes), this.retryBackoff);

    let decision = Decision.NO_OPINION;
    if (review.allowed) {
      decision = Decision.ALLOW;
    } else if (review.denied) {
      decision = Decision.DENY;
    }

    const result: AuthorizationResult = {decision, reason: review.reason};
    this.cache.set(key, result, decision === Decision.ALLOW ? this.authorizedTtl : this.unauthorizedTtl);
    return result;
  }
}
