import { spawn, type ChildProcess } from 'node:child_process';

import { ProcessInvocationError } from './errors.js';

export type SpawnFn = typeof spawn;

export type ProcessResult = {
  stdout: string;
  stderr: string;
  /**
   * stdout and stderr interleaved in arrival order.
   */
  output: string;
  exitCode: number;
};

export interface RunProcessOptions {
  input?: string;
  cwd?: string;
  onData?: (chunk: string, source: 'stdout' | 'stderr') => void;
  spawnFn?: SpawnFn;
}

function describeSpawnError(program: string, err: unknown): ProcessInvocationError {
  const osCode =
    typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string'
      ? err.code
      : undefined;
  const reason = err instanceof Error ? err.message : String(err);
  const message =
    osCode === 'ENOENT' ? `Program not found: ${program}` : `Failed to run ${program}: ${reason}`;
  return new ProcessInvocationError(program, message, osCode ? { osCode } : {});
}

export async function runProcess(
  program: string,
  args: readonly string[],
  options: RunProcessOptions = {},
): Promise<ProcessResult> {
  const spawnFn = options.spawnFn ?? spawn;

  return new Promise((resolve, reject) => {
    let child: ChildProcess;
    try {
      child = spawnFn(program, [...args], options.cwd ? { cwd: options.cwd } : {});
    } catch (err) {
      reject(describeSpawnError(program, err));
      return;
    }

    let stdout = '';
    let stderr = '';
    let output = '';
    let finished = false;

    const onChunk = (source: 'stdout' | 'stderr') => (text: string) => {
      if (source === 'stdout') {
        stdout += text;
      } else {
        stderr += text;
      }
      output += text;
      options.onData?.(text, source);
    };

    child.stdout?.setEncoding('utf-8');
    child.stderr?.setEncoding('utf-8');
    child.stdout?.on('data', onChunk('stdout'));
    child.stderr?.on('data', onChunk('stderr'));

    child.on('error', (err) => {
      if (finished) return;
      finished = true;
      reject(describeSpawnError(program, err));
    });

    child.on('close', (code) => {
      if (finished) return;
      finished = true;
      resolve({
        stdout,
        stderr,
        output,
        exitCode: typeof code === 'number' ? code : -1,
      });
    });

    if (child.stdin) {
      child.stdin.on('error', (err: NodeJS.ErrnoException) => {
        // EPIPE: the child exited without reading all of its input.
        if (err.code === 'EPIPE' || finished) return;
        finished = true;
        reject(describeSpawnError(program, err));
      });
      if (options.input !== undefined) {
        child.stdin.write(options.input);
      }
      child.stdin.end();
    }
  });
}

export function assertExitedCleanly(program: string, result: ProcessResult): void {
  if (result.exitCode === 0) {
    return;
  }
  const detail = result.stderr.trim();
  throw new ProcessInvocationError(
    program,
    `${program} exited with status ${result.exitCode}${detail ? `: ${detail}` : ''}`,
    { exitCode: result.exitCode },
  );
}
