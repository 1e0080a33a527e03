#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import sourceMapSupport from 'source-map-support';
sourceMapSupport.install(); // Enable source maps for error stack traces
import * as strongbox from './src/index.js';
import {type StrongboxLogger} from './src/core/logging/strongbox-logger.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {type ErrorHandler} from './src/core/error-handler.js';

const context: {logger?: StrongboxLogger} = {};
await strongbox
  .main(process.argv, context)
  .then((): void => {
    context.logger?.info('Strongbox CLI completed, via entrypoint');
  })
  .catch((error: unknown): void => {
    const errorHandler: ErrorHandler = container.resolve<ErrorHandler>(InjectTokens.ErrorHandler);
    errorHandler.handle(error);
  });
