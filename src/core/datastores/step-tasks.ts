// SPDX-License-Identifier: Apache-2.0

import {Listr} from 'listr2';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {StepFailedError} from '../errors/step-failed-error.js';
import {type StepName} from './datastore-step.js';
import {type Routine, type RoutineContext} from './routine.js';
import * as constants from '../constants.js';

/** A step whose routine has already been chosen. */
export interface ResolvedStep {
  readonly name: StepName;
  readonly title: string;
  readonly routine: Routine;
}

interface StepTaskContext {
  readonly context: RoutineContext;
}

/**
 * Runs the steps one after the other as listr tasks, stopping at the first failure. Interrupt signals are left to
 * {@link ScopedCleanup}.
 * @param executed receives the name of every step that completed, also when a later one fails
 * @throws StepFailedError naming the failing step, with the routine's error as cause
 */
export async function runStepTasks(
  steps: readonly ResolvedStep[],
  routineContext: RoutineContext,
  logger: StrongboxLogger,
  silent: boolean,
  executed: StepName[] = [],
): Promise<StepName[]> {
  const tasks: Listr<StepTaskContext> = new Listr<StepTaskContext>(
    steps.map(step => ({
      title: step.title,
      task: async (context_: StepTaskContext): Promise<void> => {
        logger.info(`==== Running '${step.name}' ===`);
        try {
          await step.routine(context_.context);
        } catch (error) {
          throw new StepFailedError(step.name, error);
        }
        executed.push(step.name);
      },
    })),
    {
      concurrent: false,
      exitOnError: true,
      registerSignalListeners: false,
      silentRendererCondition: silent,
      rendererOptions: {timer: constants.LISTR_DEFAULT_RENDERER_TIMER_OPTION},
      ctx: {context: routineContext},
    },
  );
  await tasks.run();
  return executed;
}
