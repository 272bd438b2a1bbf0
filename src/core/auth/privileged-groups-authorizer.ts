// SPDX-License-Identifier: Apache-2.0

import {type AuthorizationAttributes} from './authorization-attributes.js';
import {type AuthorizationResult, type Authorizer, Decision} from './authorizer.js';

/** Allows everything to members of the privileged groups. */
export class PrivilegedGroupsAuthorizer implements Authorizer {
  private readonly groups: Set<string>;

  public constructor(groups: string[]) {
    this.groups = new Set(groups);
  }

  public async authorize(attributes: AuthorizationAttributes): Promise<AuthorizationResult> {
    if (attributes.user.groups.some(group => this.groups.has(group))) {
      return {decision: Decision.ALLOW, reason: ''};
    }
    return {decision: Decision.NO_OPINION, reason: ''};
  }
}
