// SPDX-License-Identifier: Apache-2.0

import {Container} from '../src/core/dependency-injection/container-init.js';
import {type AdapterLogger} from '../src/core/logging/adapter-logger.js';
import {TestLogger} from './unit/fixtures/test-logger.fixture.js';

/**
 * Re-initialize the container; tests log to memory unless they pass their own logger
 * @param testLogger - the logger to register
 */
export function resetForTest(testLogger: AdapterLogger = new TestLogger()): void {
  // need to init the container prior to using the options for dependency injection to work
  Container.getInstance().reset('debug', true, testLogger);
}
