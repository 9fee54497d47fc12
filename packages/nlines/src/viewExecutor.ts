import type { Logger } from './logger.js';
import { assertExitedCleanly, runProcess, type SpawnFn } from './processRunner.js';
import { buildArgv, type ViewState } from './viewState.js';
import type { View } from './views.js';

export interface ViewExecutorOptions {
  logger: Logger;
  cwd?: string;
  spawnFn?: SpawnFn;
}

export class ViewExecutor {
  constructor(private readonly options: ViewExecutorOptions) {}

  /**
   * Replaces the view's content with the output of the state's command.
   * On failure the view keeps whatever output arrived.
   */
  async execute(state: ViewState, view: View): Promise<void> {
    const argv = buildArgv(state);
    const program = state.program;
    this.options.logger.debug?.(`exec: ${argv.join(' ')}`);

    view.clear();
    const result = await runProcess(program, argv.slice(1), {
      ...(this.options.cwd ? { cwd: this.options.cwd } : {}),
      ...(this.options.spawnFn ? { spawnFn: this.options.spawnFn } : {}),
      onData: (chunk) => view.append(chunk),
    });
    view.moveCursor(0);
    view.markUnmodified();
    assertExitedCleanly(program, result);
  }
}
