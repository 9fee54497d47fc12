import { InputCancelledError, isNlinesError } from './errors.js';
import type { SelectionContext } from './fileResolver.js';
import type { Logger } from './logger.js';
import type { Prompter } from './prompter.js';
import type { Presenter, ViewController } from './viewController.js';
import type { View, ViewStore } from './views.js';

export type SessionCommand =
  | { kind: 'new'; lineCount?: string }
  | { kind: 'refresh'; lineCount?: string }
  | { kind: 'switch'; lineCount?: string }
  | { kind: 'column'; delimiter?: string }
  | { kind: 'views' }
  | { kind: 'use'; name: string }
  | { kind: 'show' }
  | { kind: 'goto'; line: number }
  | { kind: 'mark'; files: string[] }
  | { kind: 'unmark' }
  | { kind: 'close'; name?: string }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'empty' }
  | { kind: 'invalid'; message: string };

export const SESSION_HELP = [
  'new [N]          open a view (choose a command, then files)',
  'refresh [N], r   re-run the active view, optionally with N lines',
  'switch [N], s    re-run the active view with another command',
  'column [DELIM]   align the active view with column (c)',
  'views            list views',
  'use NAME         show another view',
  'show             show the active view',
  'goto LINE        move the cursor of the active view',
  'mark FILE...     mark files for new views',
  'unmark           clear marked files',
  'close [NAME]     close a view',
  'quit             leave',
].join('\n');

function lineCountArg(rest: string): { lineCount?: string } {
  return rest.length > 0 ? { lineCount: rest } : {};
}

function unescapeDelimiter(value: string): string {
  return value.replace(/\\t/g, '\t');
}

export function parseSessionCommand(input: string): SessionCommand {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return { kind: 'empty' };
  }
  const match = /^(\S+)\s*(.*)$/.exec(trimmed);
  const word = match?.[1]?.toLowerCase() ?? '';
  const rest = match?.[2] ?? '';

  switch (word) {
    case 'new':
    case 'n':
      return { kind: 'new', ...lineCountArg(rest) };
    case 'refresh':
    case 'r':
      return { kind: 'refresh', ...lineCountArg(rest) };
    case 'switch':
    case 's':
      return { kind: 'switch', ...lineCountArg(rest) };
    case 'column':
    case 'c':
      return rest.length > 0
        ? { kind: 'column', delimiter: unescapeDelimiter(rest) }
        : { kind: 'column' };
    case 'views':
      return { kind: 'views' };
    case 'use':
      return rest.length > 0
        ? { kind: 'use', name: rest }
        : { kind: 'invalid', message: 'use needs a view name' };
    case 'show':
      return { kind: 'show' };
    case 'goto': {
      const line = Number(rest);
      return Number.isInteger(line) && line >= 1
        ? { kind: 'goto', line }
        : { kind: 'invalid', message: 'goto needs a line number' };
    }
    case 'mark': {
      const files = rest.split(/\s+/).filter(Boolean);
      return files.length > 0
        ? { kind: 'mark', files }
        : { kind: 'invalid', message: 'mark needs at least one file' };
    }
    case 'unmark':
      return { kind: 'unmark' };
    case 'close':
      return rest.length > 0 ? { kind: 'close', name: rest } : { kind: 'close' };
    case 'help':
      return { kind: 'help' };
    case 'quit':
    case 'exit':
    case 'q':
      return { kind: 'quit' };
    default:
      return { kind: 'invalid', message: `Unknown command: ${word} (try "help")` };
  }
}

/**
 * Marked files plus the active view's cursor line.
 */
export class SessionSelection implements SelectionContext {
  private marked: string[];

  constructor(
    private readonly views: ViewStore,
    initial: readonly string[] = [],
  ) {
    this.marked = [...initial];
  }

  mark(files: readonly string[]): void {
    this.marked = [...files];
  }

  unmark(): void {
    this.marked = [];
  }

  markedFiles(): readonly string[] {
    return this.marked;
  }

  textAtCursor(): string | undefined {
    return this.views.active?.lineAtCursor();
  }
}

export class TerminalPresenter implements Presenter {
  constructor(
    private readonly output: NodeJS.WritableStream,
    private readonly options: { header: boolean } = { header: true },
  ) {}

  present(view: View): void {
    if (this.options.header) {
      this.output.write(`== ${view.name} ==\n`);
    }
    const content = view.content;
    this.output.write(content.length === 0 || content.endsWith('\n') ? content : `${content}\n`);
  }
}

export interface SessionOptions {
  controller: ViewController;
  views: ViewStore;
  selection: SessionSelection;
  prompter: Prompter;
  presenter: Presenter;
  output: NodeJS.WritableStream;
  logger: Logger;
}

export class Session {
  constructor(private readonly options: SessionOptions) {}

  async run(): Promise<void> {
    for (;;) {
      let line: string;
      try {
        line = await this.options.prompter.readLine('nlines>');
      } catch (error: unknown) {
        if (error instanceof InputCancelledError) {
          return;
        }
        throw error;
      }

      const command = parseSessionCommand(line);
      if (command.kind === 'quit') {
        return;
      }

      try {
        await this.dispatch(command);
      } catch (error: unknown) {
        if (!isNlinesError(error)) {
          throw error;
        }
        this.options.logger.error(error.message);
      }
    }
  }

  async dispatch(command: SessionCommand): Promise<void> {
    const { controller, views, selection, presenter, logger } = this.options;

    switch (command.kind) {
      case 'new':
        await controller.create(command.lineCount);
        return;
      case 'refresh':
        await controller.refresh(command.lineCount);
        return;
      case 'switch':
        await controller.switchCommand(command.lineCount);
        return;
      case 'column':
        await controller.columnify(command.delimiter);
        return;
      case 'views': {
        const activeName = views.active?.name;
        const listing = views
          .names()
          .map((name) => `${name === activeName ? '*' : ' '} ${name}`)
          .join('\n');
        this.write(listing.length > 0 ? listing : '(no views)');
        return;
      }
      case 'use': {
        const view = views.activate(command.name);
        if (!view) {
          logger.warn(`No view named "${command.name}"`);
          return;
        }
        presenter.present(view);
        return;
      }
      case 'show': {
        const view = views.active;
        if (!view) {
          logger.warn('No active view');
          return;
        }
        presenter.present(view);
        return;
      }
      case 'goto': {
        const view = views.active;
        if (!view) {
          logger.warn('No active view');
          return;
        }
        view.moveCursor(command.line - 1);
        this.write(`${view.cursorLine + 1}: ${view.lineAtCursor() ?? ''}`);
        return;
      }
      case 'mark':
        selection.mark(command.files);
        this.write(`Marked ${command.files.length} file(s)`);
        return;
      case 'unmark':
        selection.unmark();
        return;
      case 'close': {
        const name = command.name ?? views.active?.name;
        if (name === undefined || !views.close(name)) {
          logger.warn(name === undefined ? 'No active view' : `No view named "${name}"`);
        }
        return;
      }
      case 'help':
        this.write(SESSION_HELP);
        return;
      case 'invalid':
        logger.warn(command.message);
        return;
      case 'empty':
      case 'quit':
        return;
    }
  }

  private write(text: string): void {
    this.options.output.write(`${text}\n`);
  }
}
