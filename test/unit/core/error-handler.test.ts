// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';

import {ErrorHandler} from '../../../src/core/error-handler.js';
import {AdapterError} from '../../../src/core/errors/adapter-error.js';
import {OptionsApplyError} from '../../../src/core/errors/options-apply-error.js';
import {UserBreak} from '../../../src/core/errors/user-break.js';
import {ApplyStep} from '../../../src/core/options/apply-step.js';
import {TestLogger} from '../fixtures/test-logger.fixture.js';

describe('ErrorHandler', () => {
  let logger: TestLogger;
  let errorHandler: ErrorHandler;

  beforeEach(() => {
    logger = new TestLogger();
    errorHandler = new ErrorHandler(logger);
  });

  it('should show a user break as a message', () => {
    errorHandler.handle(new UserBreak('displayed help, exiting'));

    expect(logger.entries).to.deep.equal([{level: 'user', message: 'displayed help, exiting'}]);
  });

  it('should find a user break among the causes', () => {
    errorHandler.handle(new AdapterError('wrapped', new AdapterError('again', new UserBreak('cancelled'))));

    expect(logger.entries).to.deep.equal([{level: 'user', message: 'cancelled'}]);
  });

  it('should show every other error to the user', () => {
    errorHandler.handle(new AdapterError('unable to load the policy'));

    expect(logger.entries).to.deep.equal([{level: 'error', message: 'unable to load the policy'}]);
  });

  it('should point out failures to reach the cluster', () => {
    const error = new OptionsApplyError(ApplyStep.CLIENT_CONSTRUCTION, 'unable to create a client');

    errorHandler.handle(error);

    expect(logger.messages('error')).to.deep.equal([
      'unable to reach the cluster during step client-construction',
      error.message,
    ]);
  });

  it('should not blame the cluster for other steps', () => {
    errorHandler.handle(new OptionsApplyError(ApplyStep.AUDIT, 'unable to open the audit log'));

    expect(logger.messages('error')).to.have.lengthOf(1);
  });
});
