import { beforeEach, describe, expect, it, vi } from 'vitest';

import { ReindexerError } from '@reindexer/contracts';

const prompt = vi.hoisted(() => {
  const options: unknown[] = [];
  return { run: vi.fn<() => Promise<boolean>>(), options };
});

vi.mock('enquirer', () => ({
  default: {
    Confirm: class {
      constructor(options: unknown) {
        prompt.options.push(options);
      }
      run() {
        return prompt.run();
      }
    },
  },
}));

import { PromptAbortedError, promptConfirm } from '../src/confirm.js';

describe('promptConfirm', () => {
  beforeEach(() => {
    prompt.run.mockReset();
    prompt.options.length = 0;
  });

  it('asks the question with "no" as the default answer', async () => {
    prompt.run.mockResolvedValueOnce(true);

    await expect(promptConfirm('Migrate 2 segment(s)?')).resolves.toBe(true);
    expect(prompt.options).toEqual([
      { name: 'proceed', message: 'Migrate 2 segment(s)?', initial: false },
    ]);
  });

  it('raises PromptAbortedError as a ReindexerError when the prompt is cancelled', async () => {
    const cancelled = new Error('cancelled');
    prompt.run.mockRejectedValueOnce(cancelled);

    const error = await promptConfirm('Proceed?').catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(PromptAbortedError);
    expect(error).toBeInstanceOf(ReindexerError);
    expect(error).toMatchObject({
      name: 'PromptAbortedError',
      message: 'Confirmation prompt aborted',
      cause: cancelled,
    });
  });
});
