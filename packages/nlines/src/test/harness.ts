import { Writable } from 'node:stream';

import { vi } from 'vitest';

import { DEFAULT_COLUMN_DELIMITERS } from '../columnFormatter.js';
import { FileResolver } from '../fileResolver.js';
import { CommandPicker } from '../picker.js';
import { ScriptedPrompter } from '../prompter.js';
import { CommandRegistry, DEFAULT_COMMANDS } from '../registry.js';
import { SessionSelection } from '../session.js';
import { ViewController, type Presenter } from '../viewController.js';
import { ViewExecutor } from '../viewExecutor.js';
import { ViewStore, type View } from '../views.js';
import { createSpawnStub } from './spawnStub.js';

export function createLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function createOutput() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

/**
 * Controller wired to scripted prompts and a spawn stub that echoes its argv
 * (and, for column, prefixes the piped input with its arguments).
 */
export function createHarness(options: {
  keys?: string[];
  lines?: string[];
  marked?: string[];
  presenter?: Presenter;
}) {
  const stub = createSpawnStub((command, args) => {
    if (command === 'column') {
      return { stdout: (input: string) => `[${args.join(' ')}]\n${input}` };
    }
    return { stdout: `${command} ${args.join(' ')}\n` };
  });
  const logger = createLogger();
  const prompter = new ScriptedPrompter({
    keys: options.keys ?? [],
    lines: options.lines ?? [],
  });
  const registry = new CommandRegistry(DEFAULT_COMMANDS);
  const views = new ViewStore();
  const selection = new SessionSelection(views, options.marked ?? []);
  const presented: string[] = [];
  const presenter = options.presenter ?? {
    present: (view: View) => {
      presented.push(view.name);
    },
  };

  const controller = new ViewController({
    picker: new CommandPicker(registry, prompter),
    resolver: new FileResolver({
      context: selection,
      prompter,
      cwd: '/work',
      home: '/home/ada',
      fileExists: () => false,
    }),
    views,
    executor: new ViewExecutor({ logger, spawnFn: stub.spawnFn }),
    presenter,
    logger,
    defaultLineCount: 10,
    columnDelimiters: DEFAULT_COLUMN_DELIMITERS,
    home: '/home/ada',
    spawnFn: stub.spawnFn,
  });

  return { controller, views, selection, prompter, presenter, logger, calls: stub.calls, presented };
}
