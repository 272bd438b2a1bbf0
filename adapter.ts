#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';
import * as fnm from './src/index.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {type ErrorHandler} from './src/core/error-handler.js';
import {type AdapterLogger} from './src/core/logging/adapter-logger.js';
import {UserBreak} from './src/core/errors/user-break.js';

const context: {logger?: AdapterLogger} = {};
await fnm
  .main(process.argv, context)
  .then(() => {
    context.logger?.info('metrics adapter configuration completed, via entrypoint');
  })
  .catch((error: unknown) => {
    const errorHandler = container.resolve<ErrorHandler>(InjectTokens.ErrorHandler);
    errorHandler.handle(error);
    if (!(error instanceof UserBreak)) {
      process.exitCode = 1;
    }
  });
