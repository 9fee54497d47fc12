export type NlinesErrorCode =
  | 'no_file_selected'
  | 'too_many_files'
  | 'multi_file_columnify'
  | 'process_invocation_failed'
  | 'input_cancelled'
  | 'no_active_view'
  | 'invalid_line_count'
  | 'view_name_taken'
  | 'config'
  | 'registry_config';

export class NlinesError extends Error {
  readonly code: NlinesErrorCode;

  constructor(code: NlinesErrorCode, message: string) {
    super(message);
    this.name = 'NlinesError';
    this.code = code;
  }
}

export class NoFileSelectedError extends NlinesError {
  constructor(message = 'No file selected') {
    super('no_file_selected', message);
    this.name = 'NoFileSelectedError';
  }
}

export class TooManyFilesError extends NlinesError {
  constructor(program: string, fileCount: number) {
    super('too_many_files', `${program} accepts only one file (got ${fileCount})`);
    this.name = 'TooManyFilesError';
  }
}

export class MultiFileColumnifyError extends NlinesError {
  constructor(fileCount: number) {
    super('multi_file_columnify', `Cannot columnify a view generated from ${fileCount} files`);
    this.name = 'MultiFileColumnifyError';
  }
}

export class ProcessInvocationError extends NlinesError {
  readonly program: string;
  /**
   * Exit status of the child, when it ran at all.
   */
  readonly exitCode?: number;
  /**
   * OS error code (e.g. ENOENT) when the child could not be spawned.
   */
  readonly osCode?: string;

  constructor(
    program: string,
    message: string,
    details: { exitCode?: number; osCode?: string } = {},
  ) {
    super('process_invocation_failed', message);
    this.name = 'ProcessInvocationError';
    this.program = program;
    if (details.exitCode !== undefined) {
      this.exitCode = details.exitCode;
    }
    if (details.osCode !== undefined) {
      this.osCode = details.osCode;
    }
  }
}

export class InputCancelledError extends NlinesError {
  constructor(message = 'Input cancelled') {
    super('input_cancelled', message);
    this.name = 'InputCancelledError';
  }
}

export class NoActiveViewError extends NlinesError {
  constructor(message = 'No generated view is active') {
    super('no_active_view', message);
    this.name = 'NoActiveViewError';
  }
}

export class InvalidLineCountError extends NlinesError {
  constructor(value: unknown) {
    super('invalid_line_count', `Line count must be a positive integer: ${String(value)}`);
    this.name = 'InvalidLineCountError';
  }
}

export class ViewNameTakenError extends NlinesError {
  constructor(name: string) {
    super('view_name_taken', `A view named "${name}" already exists`);
    this.name = 'ViewNameTakenError';
  }
}

export class ConfigError extends NlinesError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}

export class RegistryConfigError extends NlinesError {
  constructor(message: string) {
    super('registry_config', message);
    this.name = 'RegistryConfigError';
  }
}

export function isNlinesError(error: unknown): error is NlinesError {
  return error instanceof NlinesError;
}
