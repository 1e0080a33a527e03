// SPDX-License-Identifier: Apache-2.0

import {input} from '@inquirer/prompts';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {OperatorAbortError} from '../errors/operator-abort-error.js';

export type AskFunction = (message: string) => Promise<string>;

export const askOnTerminal: AskFunction = async (message: string): Promise<string> => input({message});

@injectable()
export class ConfirmationPrompt {
  public static readonly ACCEPTED_ANSWER: string = 'yes';

  private readonly logger: StrongboxLogger;
  private readonly ask: AskFunction;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.PromptAsk) ask?: AskFunction,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.ask = patchInject(ask, InjectTokens.PromptAsk, this.constructor.name);
  }

  /**
   * Asks until the operator gives a non-empty answer. `yes` in any letter case continues; anything else aborts.
   * @throws OperatorAbortError when the answer is not `yes`
   */
  public async confirm(question: string): Promise<void> {
    for (;;) {
      const answer: string = (await this.ask(`${question} (type 'yes' to continue)`)).trim();
      if (answer === '') {
        continue;
      }
      if (answer.toLowerCase() === ConfirmationPrompt.ACCEPTED_ANSWER) {
        this.logger.info('operator confirmed');
        return;
      }
      this.logger.info(`operator answered '${answer}', aborting`);
      throw new OperatorAbortError();
    }
  }
}
