// SPDX-License-Identifier: Apache-2.0

import * as constants from '../constants.js';
import {AdapterError} from '../errors/adapter-error.js';
import {toError} from '../helpers.js';
import {type AuthenticationRequest, type AuthenticationResponse, type Authenticator} from './authenticator.js';

/**
 * Tries every authenticator in turn; the first one that recognises the request wins and its user joins the
 * authenticated group. A request nobody recognises is anonymous when anonymous requests are allowed, but a request
 * whose credentials were rejected never is.
 */
export class DelegatingAuthenticator implements Authenticator {
  public constructor(
    private readonly authenticators: Authenticator[],
    private readonly anonymous: boolean,
  ) {}

  public async authenticate(request: AuthenticationRequest): Promise<AuthenticationResponse | undefined> {
    const errors: Error[] = [];
    for (const authenticator of this.authenticators) {
      try {
        const response = await authenticator.authenticate(request);
        if (response) {
          return DelegatingAuthenticator.withAuthenticatedGroup(response);
        }
      } catch (error) {
        errors.push(toError(error));
      }
    }

    if (errors.length > 0) {
      throw new AdapterError(`unable to authenticate the request: ${errors.map(error => error.message).join('; ')}`, errors[0]);
    }

    if (!this.anonymous) {
      return undefined;
    }
    return {user: {name: constants.ANONYMOUS_USER, groups: [constants.UNAUTHENTICATED_GROUP], extra: {}}};
  }

  public size(): number {
    return this.authenticators.length;
  }

  private static withAuthenticatedGroup(response: AuthenticationResponse): AuthenticationResponse {
    const {user} = response;
    if (user.name === constants.ANONYMOUS_USER || user.groups.includes(constants.AUTHENTICATED_GROUP)) {
      return response;
    }
    return {...response, user: {...user, groups: [...user.groups, constants.AUTHENTICATED_GROUP]}};
  }
}
