import { ReindexerError } from '@reindexer/contracts';
import Enquirer from 'enquirer';

import type { ConfirmFn } from './prepare-job.js';

type PromptOptions = { name: string; message: string } & Record<string, unknown>;
type PromptCtor<T> = new (options: PromptOptions) => { run: () => Promise<T> };

const { Confirm } = Enquirer as unknown as {
  Confirm: PromptCtor<boolean>;
};

export class PromptAbortedError extends ReindexerError {
  constructor(message = 'Confirmation prompt aborted', options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Interactive yes/no prompt. Defaults to "no"; Ctrl+C raises `PromptAbortedError`.
 */
export const promptConfirm: ConfirmFn = async (question) => {
  const prompt = new Confirm({ name: 'proceed', message: question, initial: false });
  try {
    return await prompt.run();
  } catch (error) {
    // Enquirer rejects on cancel
    throw new PromptAbortedError(undefined, { cause: error });
  }
};
