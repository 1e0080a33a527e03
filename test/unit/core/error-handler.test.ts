// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import sinon, {type SinonStub, type SinonStubbedInstance} from 'sinon';
import {ErrorHandler} from '../../../src/core/error-handler.js';
import {StrongboxPinoLogger} from '../../../src/core/logging/strongbox-pino-logger.js';
import {UserBreak} from '../../../src/core/errors/user-break.js';
import {OperatorAbortError} from '../../../src/core/errors/operator-abort-error.js';
import {PreconditionError} from '../../../src/core/errors/precondition-error.js';
import {StrongboxError} from '../../../src/core/errors/strongbox-error.js';
import {StepFailedError} from '../../../src/core/errors/step-failed-error.js';

describe('ErrorHandler', (): void => {
  let logger: SinonStubbedInstance<StrongboxPinoLogger>;
  let exit: SinonStub<[number], void>;
  let handler: ErrorHandler;

  beforeEach((): void => {
    logger = sinon.createStubInstance(StrongboxPinoLogger);
    exit = sinon.stub<[number], void>();
    handler = new ErrorHandler(logger, exit);
  });

  afterEach((): void => {
    sinon.restore();
  });

  it('should exit cleanly on a user break', (): void => {
    handler.handle(new UserBreak('version shown'));

    expect(logger.info).to.have.been.calledWith('version shown');
    expect(logger.showUserError).not.to.have.been.called;
    expect(exit).to.have.been.calledOnceWith(0);
  });

  it('should report an operator abort without a stack and exit non-zero', (): void => {
    handler.handle(new OperatorAbortError());

    expect(logger.showUser).to.have.been.calledWith(chalk.yellow('Restore aborted by operator'));
    expect(exit).to.have.been.calledOnceWith(1);
  });

  it('should show any other error and exit with 1', (): void => {
    const error: PreconditionError = new PreconditionError('node-1 must be in maintenance mode');

    handler.handle(error);

    expect(logger.showUserError).to.have.been.calledOnceWith(error);
    expect(exit).to.have.been.calledOnceWith(1);
  });
});

describe('StrongboxError', (): void => {
  it('should keep the cause and its numeric code', (): void => {
    const cause: Error & {code?: number} = new Error('connection refused');
    cause.code = 255;

    const error: StrongboxError = new StrongboxError('unable to reach node-1', cause, {host: 'node-1'});

    expect(error.name).to.equal('StrongboxError');
    expect(error.cause).to.equal(cause);
    expect(error.statusCode).to.equal(255);
    expect(error.meta).to.deep.equal({host: 'node-1'});
    expect(error.stack).to.contain('Caused by: Error: connection refused');
  });

  it('should name the failing step and keep the routine error', (): void => {
    const cause: Error = new Error('import failed');

    const error: StepFailedError = new StepFailedError('mysql', cause);

    expect(error.message).to.equal("Step 'mysql' failed: import failed");
    expect(error.name).to.equal('StepFailedError');
    expect(error.stepName).to.equal('mysql');
    expect(error.cause).to.equal(cause);
  });
});
