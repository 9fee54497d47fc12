import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DEFAULT_LINE_COUNT, loadConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nlines-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(filename: string, contents: string): void {
    fs.writeFileSync(path.join(dir, filename), contents, 'utf8');
  }

  it('falls back to the built-in defaults without a config file', () => {
    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.defaultLineCount).toBe(DEFAULT_LINE_COUNT);
    expect(config.helpKey).toBe('?');
    expect(config.commands.map((command) => command.key)).toEqual(['h', 't', 's']);
    expect(config.columnDelimiters).toEqual({ csv: ',', tsv: '\t', psv: '|' });
    expect(config.debug).toBe(false);
  });

  it('loads YAML config from the working directory', () => {
    write(
      'nlines.config.yaml',
      [
        'defaultLineCount: 25',
        'helpKey: "!"',
        'commands:',
        '  - key: h',
        '    program: head',
        '    lineFlag: -n',
        '  - key: f',
        '    program: tail',
        '    lineFlag: --lines',
        '    extraArgs: [--retry]',
        '    singleFileOnly: true',
        'columnDelimiters:',
        '  log: " "',
      ].join('\n'),
    );

    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.defaultLineCount).toBe(25);
    expect(config.helpKey).toBe('!');
    expect(config.commands).toEqual([
      { key: 'h', program: 'head', lineFlag: '-n', extraArgs: [], singleFileOnly: false },
      { key: 'f', program: 'tail', lineFlag: '--lines', extraArgs: ['--retry'], singleFileOnly: true },
    ]);
    expect(config.columnDelimiters).toEqual({ csv: ',', tsv: '\t', psv: '|', log: ' ' });
  });

  it('prefers the JSON file when several exist', () => {
    write('nlines.config.json', JSON.stringify({ defaultLineCount: 5 }));
    write('nlines.config.yaml', 'defaultLineCount: 6');

    expect(loadConfig({ cwd: dir, env: {} }).defaultLineCount).toBe(5);
  });

  it('lets the environment override the default line count and enable debug', () => {
    write('nlines.config.json', JSON.stringify({ defaultLineCount: 5 }));

    const config = loadConfig({
      cwd: dir,
      env: { NLINES_DEFAULT_LINES: '40', NLINES_DEBUG: 'true' },
    });

    expect(config.defaultLineCount).toBe(40);
    expect(config.debug).toBe(true);
  });

  it('rejects an invalid NLINES_DEFAULT_LINES', () => {
    expect(() => loadConfig({ cwd: dir, env: { NLINES_DEFAULT_LINES: '0' } })).toThrow(
      ConfigError,
    );
  });

  it('reads an explicit config path relative to the working directory', () => {
    write('custom.yml', 'defaultLineCount: 3');

    expect(loadConfig({ cwd: dir, configPath: 'custom.yml', env: {} }).defaultLineCount).toBe(3);
  });

  it('reports a missing explicit config file', () => {
    expect(() => loadConfig({ cwd: dir, configPath: 'missing.yaml', env: {} })).toThrow(
      /Configuration file not found/,
    );
  });

  it('reports schema violations with their path', () => {
    write('nlines.config.json', JSON.stringify({ commands: [{ key: 'hh', program: 'head' }] }));

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/commands\.0\.key: must be a single character/);
  });

  it('treats an empty YAML file as defaults', () => {
    write('nlines.config.yml', '');

    expect(loadConfig({ cwd: dir, env: {} }).defaultLineCount).toBe(DEFAULT_LINE_COUNT);
  });
});
