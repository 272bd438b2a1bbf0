// SPDX-License-Identifier: Apache-2.0

import {AdapterError} from './adapter-error.js';
import {ApplyStep} from '../options/apply-step.js';

export class OptionsApplyError extends AdapterError {
  /**
   * Create an error for a failed step of the options pipeline
   *
   * error metadata will include the failed `step`
   *
   * @param step - the step that failed
   * @param message - error message
   * @param cause - source error (if any)
   */
  public constructor(
    public readonly step: ApplyStep,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause, {step});
  }

  /**
   * Client construction talks to the outside world, every other step only fails on bad configuration.
   */
  public isInfrastructureFailure(): boolean {
    return this.step === ApplyStep.CLIENT_CONSTRUCTION;
  }
}
