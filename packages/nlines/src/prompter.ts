import { createPrompt, ExitPromptError, useKeypress, useState, type KeypressEvent } from '@inquirer/core';
import { input } from '@inquirer/prompts';

import { InputCancelledError } from './errors.js';

/**
 * The interaction points operations may suspend on.
 */
export interface Prompter {
  /**
   * Reads one character restricted to `choices`.
   */
  readKey(message: string, choices: readonly string[]): Promise<string>;
  readLine(message: string): Promise<string>;
  /**
   * Shows transient text beside the current view (help listings).
   */
  showSide(title: string, text: string): void;
}

type KeyPromptConfig = {
  message: string;
  choices: readonly string[];
};

function pressedCharacter(key: KeypressEvent): string | undefined {
  // readline leaves `name` undefined for punctuation such as "?".
  if ('sequence' in key && typeof key.sequence === 'string' && key.sequence.length > 0) {
    return key.sequence;
  }
  return key.name || undefined;
}

const keyPrompt = createPrompt<string, KeyPromptConfig>((config, done) => {
  const [answer, setAnswer] = useState<string | undefined>(undefined);

  useKeypress((key) => {
    if (answer !== undefined) {
      return;
    }
    if (key.name === 'escape') {
      setAnswer('');
      done('');
      return;
    }
    const pressed = pressedCharacter(key);
    if (pressed !== undefined && config.choices.includes(pressed)) {
      setAnswer(pressed);
      done(pressed);
    }
  });

  if (answer !== undefined) {
    return `${config.message} ${answer}`;
  }
  return `${config.message} [${config.choices.join('')}]`;
});

async function cancellable<T>(prompt: () => Promise<T>): Promise<T> {
  try {
    return await prompt();
  } catch (error: unknown) {
    if (error instanceof ExitPromptError) {
      throw new InputCancelledError();
    }
    throw error;
  }
}

export class InquirerPrompter implements Prompter {
  constructor(private readonly output: NodeJS.WritableStream = process.stdout) {}

  async readKey(message: string, choices: readonly string[]): Promise<string> {
    const key = await cancellable(() => keyPrompt({ message, choices }));
    if (key === '') {
      throw new InputCancelledError();
    }
    return key;
  }

  async readLine(message: string): Promise<string> {
    return cancellable(() => input({ message }));
  }

  showSide(title: string, text: string): void {
    this.output.write(`-- ${title} --\n${text}\n`);
  }
}

/**
 * Non-interactive prompter answering from fixed queues; running out of
 * answers counts as cancellation. Used for one-shot runs, where the command
 * key comes from the command line.
 */
export class ScriptedPrompter implements Prompter {
  private readonly keys: string[];
  private readonly lines: string[];
  readonly sideOutputs: Array<{ title: string; text: string }> = [];
  readonly keyRequests: Array<{ message: string; choices: readonly string[] }> = [];

  constructor(answers: { keys?: string[]; lines?: string[] } = {}) {
    this.keys = [...(answers.keys ?? [])];
    this.lines = [...(answers.lines ?? [])];
  }

  async readKey(message: string, choices: readonly string[]): Promise<string> {
    this.keyRequests.push({ message, choices });
    while (this.keys.length > 0) {
      const next = this.keys.shift();
      if (next !== undefined && choices.includes(next)) {
        return next;
      }
    }
    throw new InputCancelledError();
  }

  async readLine(_message: string): Promise<string> {
    const next = this.lines.shift();
    if (next === undefined) {
      throw new InputCancelledError();
    }
    return next;
  }

  showSide(title: string, text: string): void {
    this.sideOutputs.push({ title, text });
  }
}
