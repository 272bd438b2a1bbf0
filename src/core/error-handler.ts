// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type AdapterLogger} from './logging/adapter-logger.js';
import {UserBreak} from './errors/user-break.js';
import {OptionsApplyError} from './errors/options-apply-error.js';

@injectable()
export class ErrorHandler {
  private readonly logger: AdapterLogger;

  public constructor(@inject(InjectTokens.AdapterLogger) logger?: AdapterLogger) {
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  public handle(error: unknown): void {
    const userBreak = this.extractBreak(error);
    if (userBreak) {
      this.handleUserBreak(userBreak);
      return;
    }

    if (error instanceof OptionsApplyError && error.isInfrastructureFailure()) {
      this.logger.error(`unable to reach the cluster during step ${error.step}`);
    }
    this.handleError(error);
  }

  private handleUserBreak(userBreak: UserBreak): void {
    this.logger.showUser(userBreak.message);
  }

  private handleError(error: unknown): void {
    this.logger.showUserError(error);
  }

  /**
   * Recursively checks if an error is or is caused by a UserBreak
   * Returns the UserBreak if found, otherwise undefined
   */
  private extractBreak(error: unknown): UserBreak | undefined {
    if (error instanceof UserBreak) {
      return error;
    }
    if (error instanceof Error && error.cause !== undefined) {
      return this.extractBreak(error.cause);
    }
    return undefined;
  }
}
