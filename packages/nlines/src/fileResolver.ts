import fs from 'node:fs';
import path from 'node:path';

import { NoFileSelectedError } from './errors.js';
import type { Prompter } from './prompter.js';

/**
 * Where files can be picked up from without asking.
 */
export interface SelectionContext {
  markedFiles(): readonly string[];
  /**
   * Text under the cursor of the active view, if any.
   */
  textAtCursor(): string | undefined;
}

export interface FileResolverOptions {
  context: SelectionContext;
  prompter: Prompter;
  cwd: string;
  home: string;
  fileExists?: (filePath: string) => boolean;
}

function isExistingFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function expandPath(input: string, cwd: string, home: string): string {
  const trimmed = input.trim();
  if (trimmed === '~') {
    return path.resolve(home);
  }
  if (trimmed.startsWith('~/')) {
    return path.resolve(home, trimmed.slice(2));
  }
  return path.resolve(cwd, trimmed);
}

export class FileResolver {
  private readonly fileExists: (filePath: string) => boolean;

  constructor(private readonly options: FileResolverOptions) {
    this.fileExists = options.fileExists ?? isExistingFile;
  }

  async resolveFiles(): Promise<string[]> {
    const { context, prompter, cwd, home } = this.options;

    const marked = context
      .markedFiles()
      .filter((entry) => entry.trim().length > 0)
      .map((entry) => expandPath(entry, cwd, home));
    if (marked.length > 0) {
      return marked;
    }

    const atCursor = context.textAtCursor()?.trim();
    if (atCursor) {
      const candidate = expandPath(atCursor, cwd, home);
      if (this.fileExists(candidate)) {
        return [candidate];
      }
    }

    const answer = (await prompter.readLine('File:')).trim();
    if (answer.length > 0) {
      return [expandPath(answer, cwd, home)];
    }

    throw new NoFileSelectedError();
  }
}
