import path from 'node:path';

import { assertExitedCleanly, runProcess, type SpawnFn } from './processRunner.js';

export const COLUMN_PROGRAM = 'column';

export const DEFAULT_COLUMN_DELIMITERS: Readonly<Record<string, string>> = {
  csv: ',',
  tsv: '\t',
  psv: '|',
};

export function resolveDelimiter(
  filePath: string,
  table: Readonly<Record<string, string>>,
  override?: string,
): string | undefined {
  if (override !== undefined && override.length > 0) {
    return override;
  }
  const extension = path.extname(filePath).slice(1).toLowerCase();
  if (!extension) {
    return undefined;
  }
  for (const [candidate, delimiter] of Object.entries(table)) {
    if (candidate.replace(/^\./, '').toLowerCase() === extension) {
      return delimiter;
    }
  }
  return undefined;
}

export function buildColumnArgs(delimiter?: string): string[] {
  return delimiter === undefined ? ['--table'] : ['--table', '--separator', delimiter];
}

export async function formatColumns(
  content: string,
  options: { delimiter?: string; spawnFn?: SpawnFn } = {},
): Promise<string> {
  const result = await runProcess(COLUMN_PROGRAM, buildColumnArgs(options.delimiter), {
    input: content,
    ...(options.spawnFn ? { spawnFn: options.spawnFn } : {}),
  });
  assertExitedCleanly(COLUMN_PROGRAM, result);
  return result.stdout;
}
