import { describe, expect, it } from 'vitest';

import { parseSessionCommand, Session, TerminalPresenter, type SessionCommand } from './session.js';
import { createHarness, createOutput } from './test/harness.js';

describe('parseSessionCommand', () => {
  it.each<[string, SessionCommand]>([
    ['new', { kind: 'new' }],
    ['new 20', { kind: 'new', lineCount: '20' }],
    ['r 5', { kind: 'refresh', lineCount: '5' }],
    ['switch', { kind: 'switch' }],
    ['c \\t', { kind: 'column', delimiter: '\t' }],
    ['column ;', { kind: 'column', delimiter: ';' }],
    ['use head, multiple files<2>', { kind: 'use', name: 'head, multiple files<2>' }],
    ['goto 3', { kind: 'goto', line: 3 }],
    ['mark a.txt  b.txt', { kind: 'mark', files: ['a.txt', 'b.txt'] }],
    ['close', { kind: 'close' }],
    ['  ', { kind: 'empty' }],
    ['EXIT', { kind: 'quit' }],
  ])('parses %j', (input, expected) => {
    expect(parseSessionCommand(input)).toEqual(expected);
  });

  it('reports malformed commands', () => {
    expect(parseSessionCommand('goto zero')).toEqual({
      kind: 'invalid',
      message: 'goto needs a line number',
    });
    expect(parseSessionCommand('bogus')).toEqual({
      kind: 'invalid',
      message: 'Unknown command: bogus (try "help")',
    });
  });
});

describe('TerminalPresenter', () => {
  it('prints a header and terminates the content with a newline', () => {
    const output = createOutput();
    const { views } = createHarness({});
    const view = views.getOrCreate('head /tmp/a.txt');
    view.append('last line without newline');

    new TerminalPresenter(output.stream).present(view);
    new TerminalPresenter(output.stream, { header: false }).present(view);

    expect(output.text()).toBe(
      '== head /tmp/a.txt ==\nlast line without newline\nlast line without newline\n',
    );
  });
});

describe('Session', () => {
  function createSession(options: { keys?: string[]; lines: string[]; marked?: string[] }) {
    const output = createOutput();
    const harness = createHarness({
      ...options,
      presenter: new TerminalPresenter(output.stream),
    });
    const session = new Session({
      controller: harness.controller,
      views: harness.views,
      selection: harness.selection,
      prompter: harness.prompter,
      presenter: harness.presenter,
      output: output.stream,
      logger: harness.logger,
    });
    return { session, output, ...harness };
  }

  it('creates, switches and lists views', async () => {
    const { session, output } = createSession({
      keys: ['h', 't'],
      lines: ['new 3', 'switch', 'views', 'goto 1', 'quit'],
      marked: ['/tmp/a.txt'],
    });

    await session.run();

    expect(output.text()).toBe(
      [
        '== head /tmp/a.txt ==',
        'head --lines 3 /tmp/a.txt',
        '== tail /tmp/a.txt ==',
        'tail --lines 3 /tmp/a.txt',
        '* tail /tmp/a.txt',
        '1: tail --lines 3 /tmp/a.txt',
        '',
      ].join('\n'),
    );
  });

  it('reports operation errors and keeps going', async () => {
    const { session, logger, views } = createSession({
      keys: ['h'],
      lines: ['refresh', 'new', 'quit'],
      marked: ['/tmp/a.txt'],
    });

    await session.run();

    expect(logger.error).toHaveBeenCalledWith('No generated view is active');
    expect(views.names()).toEqual(['head /tmp/a.txt']);
  });

  it('uses marked files for new views', async () => {
    const { session, views } = createSession({
      keys: ['h'],
      lines: ['mark /tmp/x.txt /tmp/y.txt', 'new', 'quit'],
    });

    await session.run();

    expect(views.names()).toEqual(['head, multiple files']);
    expect(views.active?.state?.files).toEqual(['/tmp/x.txt', '/tmp/y.txt']);
  });

  it('warns about unknown commands and views', async () => {
    const { session, logger } = createSession({ lines: ['bogus', 'use nothing', 'show', 'quit'] });

    await session.run();

    expect(logger.warn).toHaveBeenNthCalledWith(1, 'Unknown command: bogus (try "help")');
    expect(logger.warn).toHaveBeenNthCalledWith(2, 'No view named "nothing"');
    expect(logger.warn).toHaveBeenNthCalledWith(3, 'No active view');
  });

  it('ends when input is cancelled', async () => {
    const { session, output } = createSession({ lines: [] });

    await expect(session.run()).resolves.toBeUndefined();
    expect(output.text()).toBe('');
  });

  it('closes the active view', async () => {
    const { session, views } = createSession({
      keys: ['h'],
      lines: ['new', 'close', 'quit'],
      marked: ['/tmp/a.txt'],
    });

    await session.run();

    expect(views.names()).toEqual([]);
  });
});
