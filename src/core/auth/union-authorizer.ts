// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from '../errors/adapter-error.js';
import {toError} from '../helpers.js';
import {type AuthorizationAttributes} from './authorization-attributes.js';
import {type AuthorizationResult, type Authorizer, Decision} from './authorizer.js';

/**
 * Asks each authorizer in turn until one allows or denies. Failing authorizers are skipped; when nobody decides and
 * at least one failed, the failures are raised.
 */
export class UnionAuthorizer implements Authorizer {
  public constructor(private readonly authorizers: Authorizer[]) {}

  public async authorize(attributes: AuthorizationAttributes): Promise<AuthorizationResult> {
    const reasons: string[] = [];
    const errors: Error[] = [];
    for (const authorizer of this.authorizers) {
      try {
        const result = await authorizer.authorize(attributes);
        if (result.decision !== Decision.NO_OPINION) {
          return result;
        }
        if (result.reason) {
          reasons.push(result.reason);
        }
      } catch (error) {
        errors.push(toError(error));
      }
    }

    if (errors.length > 0) {
      throw new AdapterError(`unable to authorize the request: ${errors.map(error => error.message).join('; ')}`, errors[0]);
    }
    return {decision: Decision.NO_OPINION, reason: reasons.join('\n')};
  }

  public size(): number {
    return this.authorizers.length;
  }
}
