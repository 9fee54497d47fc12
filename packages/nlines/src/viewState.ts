import path from 'node:path';

import { InvalidLineCountError, NoFileSelectedError, TooManyFilesError } from './errors.js';
import type { CommandDescriptor } from './registry.js';

/**
 * How a view was produced. Replaced wholesale on command switches; only
 * `lineCount` changes on refresh.
 */
export interface ViewState {
  readonly program: string;
  readonly lineFlag: string;
  readonly extraArgs: readonly string[];
  readonly singleFileOnly: boolean;
  /**
   * Positive integer, kept as the string passed after `lineFlag`.
   */
  lineCount: string;
  readonly files: readonly string[];
}

export function normalizeLineCount(value: number | string): string {
  const text = typeof value === 'number' ? String(value) : value.trim();
  if (!/^\d+$/.test(text)) {
    throw new InvalidLineCountError(value);
  }
  const digits = text.replace(/^0+(?=\d)/, '');
  if (digits === '0') {
    throw new InvalidLineCountError(value);
  }
  return digits;
}

export function createViewState(
  descriptor: CommandDescriptor,
  lineCount: number | string,
  files: readonly string[],
): ViewState {
  if (files.length === 0) {
    throw new NoFileSelectedError();
  }
  if (descriptor.singleFileOnly && files.length > 1) {
    throw new TooManyFilesError(descriptor.program, files.length);
  }
  return {
    program: descriptor.program,
    lineFlag: descriptor.lineFlag,
    extraArgs: [...descriptor.extraArgs],
    singleFileOnly: descriptor.singleFileOnly,
    lineCount: normalizeLineCount(lineCount),
    files: [...files],
  };
}

export function buildArgv(state: ViewState): string[] {
  return [state.program, state.lineFlag, state.lineCount, ...state.extraArgs, ...state.files];
}

export function abbreviatePath(filePath: string, home: string): string {
  if (!home) {
    return filePath;
  }
  const normalizedHome = home.endsWith(path.sep) && home.length > 1 ? home.slice(0, -1) : home;
  if (filePath === normalizedHome) {
    return '~';
  }
  if (filePath.startsWith(`${normalizedHome}${path.sep}`)) {
    return `~${filePath.slice(normalizedHome.length)}`;
  }
  return filePath;
}

/**
 * Returns `base` or the first free `base<N>` (N >= 2). A name equal to
 * `ignore` counts as free, so a view can keep its own name on rename.
 */
export function uniqueViewName(
  base: string,
  taken: Iterable<string>,
  ignore?: string,
): string {
  const takenNames = new Set(taken);
  const isFree = (candidate: string) => candidate === ignore || !takenNames.has(candidate);

  if (isFree(base)) {
    return base;
  }
  for (let suffix = 2; ; suffix += 1) {
    const candidate = `${base}<${suffix}>`;
    if (isFree(candidate)) {
      return candidate;
    }
  }
}

export function deriveName(
  state: Pick<ViewState, 'program' | 'files'>,
  taken: Iterable<string>,
  options: { home: string; ignore?: string },
): string {
  const [onlyFile] = state.files;
  if (state.files.length === 1 && onlyFile !== undefined) {
    return `${state.program} ${abbreviatePath(onlyFile, options.home)}`;
  }
  return uniqueViewName(`${state.program}, multiple files`, taken, options.ignore);
}
