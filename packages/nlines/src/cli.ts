import os from 'node:os';

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadConfig } from './config.js';
import { isNlinesError, type NlinesError } from './errors.js';
import { FileResolver } from './fileResolver.js';
import { createConsoleLogger, type Logger } from './logger.js';
import { CommandPicker } from './picker.js';
import type { SpawnFn } from './processRunner.js';
import { InquirerPrompter, ScriptedPrompter, type Prompter } from './prompter.js';
import { CommandRegistry } from './registry.js';
import { Session, SessionSelection, TerminalPresenter } from './session.js';
import { ViewController } from './viewController.js';
import { ViewExecutor } from './viewExecutor.js';
import { normalizeLineCount } from './viewState.js';
import { ViewStore } from './views.js';

const EXIT_OK = 0;
const EXIT_UNKNOWN_ERROR = 1;
const EXIT_USAGE = 2;
const EXIT_CONFIG = 3;
const EXIT_PROCESS_FAILURE = 4;
const EXIT_REJECTED = 5;
const EXIT_CANCELLED = 130;

export interface CliDependencies {
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
  output?: NodeJS.WritableStream;
  errorOutput?: NodeJS.WritableStream;
  logger?: Logger;
  prompter?: Prompter;
  spawnFn?: SpawnFn;
}

type CliArgs = {
  files?: string[];
  lines?: number;
  config?: string;
  command?: string;
  print: boolean;
};

interface ExitError extends Error {
  exitCode: number;
}

function isExitError(error: unknown): error is ExitError {
  return (
    error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number'
  );
}

function throwExitError(code: number, message: string): never {
  throw Object.assign(new Error(message), { exitCode: code });
}

export async function runCli(
  argv: string[] = hideBin(process.argv),
  deps: CliDependencies = {},
): Promise<void> {
  const errorOutput = deps.errorOutput ?? process.stderr;

  try {
    const parser = yargs(argv)
      .scriptName('nlines')
      .usage('Usage: $0 [files..] [options]')
      .option('lines', {
        alias: 'n',
        type: 'number',
        describe: 'Line count for new views (overrides the configured default).',
      })
      .option('config', {
        alias: 'c',
        type: 'string',
        describe: 'Path to a config file (default: nlines.config.(json|yaml|yml)).',
      })
      .option('command', {
        alias: 'k',
        type: 'string',
        describe: 'Command key to run non-interactively (requires --print).',
      })
      .option('print', {
        alias: 'p',
        type: 'boolean',
        default: false,
        describe: 'Run one command over the files, print the output and exit.',
      })
      .command(
        '$0 [files..]',
        'Open head/tail/shuf views over files.',
        (command) =>
          command.positional('files', {
            type: 'string',
            array: true,
            describe: 'Files to mark for new views.',
          }),
        async (args) => {
          await runNlines(
            {
              print: args.print,
              ...(args.files ? { files: args.files } : {}),
              ...(args.lines !== undefined ? { lines: args.lines } : {}),
              ...(args.config ? { config: args.config } : {}),
              ...(args.command ? { command: args.command } : {}),
            },
            deps,
          );
        },
      )
      .exitProcess(false)
      .fail((msg: string, err: Error | undefined) => {
        if (err && (isNlinesError(err) || isExitError(err))) {
          throw err;
        }
        throwExitError(
          EXIT_USAGE,
          err?.message ?? msg ?? 'Invalid command usage. Run with --help for usage.',
        );
      })
      .strict()
      .help();

    await parser.parseAsync();
    process.exitCode = EXIT_OK;
  } catch (error: unknown) {
    handleCliError(error, errorOutput);
  }
}

async function runNlines(args: CliArgs, deps: CliDependencies): Promise<void> {
  const cwd = deps.cwd ?? process.cwd();
  const home = deps.home ?? os.homedir();
  const output = deps.output ?? process.stdout;

  const config = loadConfig({
    cwd,
    env: deps.env ?? process.env,
    ...(args.config ? { configPath: args.config } : {}),
  });
  const logger = deps.logger ?? createConsoleLogger({ debug: config.debug });
  const registry = new CommandRegistry(config.commands, config.helpKey);
  const files = args.files ?? [];
  const defaultLineCount =
    args.lines !== undefined ? Number(normalizeLineCount(args.lines)) : config.defaultLineCount;

  let prompter: Prompter;
  if (args.print) {
    if (!args.command) {
      throwExitError(EXIT_USAGE, '--print requires --command');
    }
    if (!registry.lookup(args.command)) {
      throwExitError(
        EXIT_USAGE,
        `Unknown command key "${args.command}" (available: ${registry.keys().join(', ')})`,
      );
    }
    if (files.length === 0) {
      throwExitError(EXIT_USAGE, '--print requires at least one file');
    }
    prompter = new ScriptedPrompter({ keys: [args.command] });
  } else {
    if (args.command) {
      throwExitError(EXIT_USAGE, '--command is only used with --print');
    }
    prompter = deps.prompter ?? new InquirerPrompter(output);
  }

  const views = new ViewStore();
  const selection = new SessionSelection(views, files);
  const presenter = new TerminalPresenter(output, { header: !args.print });
  const controller = new ViewController({
    picker: new CommandPicker(registry, prompter),
    resolver: new FileResolver({ context: selection, prompter, cwd, home }),
    views,
    executor: new ViewExecutor({
      logger,
      cwd,
      ...(deps.spawnFn ? { spawnFn: deps.spawnFn } : {}),
    }),
    presenter,
    logger,
    defaultLineCount,
    columnDelimiters: config.columnDelimiters,
    home,
    ...(deps.spawnFn ? { spawnFn: deps.spawnFn } : {}),
  });

  if (args.print) {
    await controller.create();
    return;
  }

  logger.debug?.(`commands: ${registry.keys().join(', ')}; default lines: ${defaultLineCount}`);
  await new Session({ controller, views, selection, prompter, presenter, output, logger }).run();
}

function exitCodeFor(error: NlinesError): number {
  switch (error.code) {
    case 'config':
    case 'registry_config':
      return EXIT_CONFIG;
    case 'invalid_line_count':
      return EXIT_USAGE;
    case 'process_invocation_failed':
      return EXIT_PROCESS_FAILURE;
    case 'no_file_selected':
    case 'too_many_files':
    case 'multi_file_columnify':
    case 'no_active_view':
    case 'view_name_taken':
      return EXIT_REJECTED;
    case 'input_cancelled':
      return EXIT_CANCELLED;
    default:
      return EXIT_UNKNOWN_ERROR;
  }
}

function handleCliError(error: unknown, errorOutput: NodeJS.WritableStream): void {
  if (isExitError(error)) {
    errorOutput.write(`${error.message}\n`);
    process.exitCode = error.exitCode;
    return;
  }

  if (isNlinesError(error)) {
    errorOutput.write(`${error.message}\n`);
    process.exitCode = exitCodeFor(error);
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  errorOutput.write(`Unexpected error: ${message}\n`);
  process.exitCode = EXIT_UNKNOWN_ERROR;
}
