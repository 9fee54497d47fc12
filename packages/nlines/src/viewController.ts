import { formatColumns, resolveDelimiter } from './columnFormatter.js';
import { MultiFileColumnifyError, NoActiveViewError } from './errors.js';
import type { FileResolver } from './fileResolver.js';
import type { Logger } from './logger.js';
import type { CommandPicker } from './picker.js';
import type { SpawnFn } from './processRunner.js';
import type { ViewExecutor } from './viewExecutor.js';
import { createViewState, deriveName, normalizeLineCount, type ViewState } from './viewState.js';
import type { View, ViewStore } from './views.js';

export interface Presenter {
  present(view: View): void;
}

export interface ViewControllerOptions {
  picker: CommandPicker;
  resolver: FileResolver;
  views: ViewStore;
  executor: ViewExecutor;
  presenter: Presenter;
  logger: Logger;
  defaultLineCount: number;
  columnDelimiters: Readonly<Record<string, string>>;
  home: string;
  /**
   * Used when piping views through the column formatter.
   */
  spawnFn?: SpawnFn;
}

export class ViewController {
  constructor(private readonly options: ViewControllerOptions) {}

  async create(lineCount?: number | string): Promise<View> {
    const { picker, resolver, views, home } = this.options;

    const descriptor = await picker.choose();
    const files = await resolver.resolveFiles();
    const state = createViewState(descriptor, lineCount ?? this.options.defaultLineCount, files);

    const view = views.getOrCreate(deriveName(state, views.names(), { home }));
    view.state = state;
    views.activate(view.name);
    this.options.logger.debug?.(`create: ${view.name}`);

    await this.executeAndPresent(state, view);
    return view;
  }

  async refresh(lineCount?: number | string): Promise<View> {
    const { view, state } = this.requireActiveView();

    if (lineCount !== undefined) {
      state.lineCount = normalizeLineCount(lineCount);
      this.renameView(view, state);
    }

    await this.executeAndPresent(state, view);
    return view;
  }

  async switchCommand(lineCount?: number | string): Promise<View> {
    const { view, state } = this.requireActiveView();

    const descriptor = await this.options.picker.choose();
    const next = createViewState(descriptor, lineCount ?? state.lineCount, state.files);

    this.renameView(view, next);
    view.state = next;
    this.options.logger.debug?.(`switch: ${state.program} -> ${next.program}`);

    await this.executeAndPresent(next, view);
    return view;
  }

  async columnify(delimiter?: string): Promise<View> {
    const { view, state } = this.requireActiveView();

    const [file] = state.files;
    if (state.files.length > 1 || file === undefined) {
      throw new MultiFileColumnifyError(state.files.length);
    }

    const separator = resolveDelimiter(file, this.options.columnDelimiters, delimiter);
    const formatted = await formatColumns(view.content, {
      ...(separator !== undefined ? { delimiter: separator } : {}),
      ...(this.options.spawnFn ? { spawnFn: this.options.spawnFn } : {}),
    });

    view.replaceContent(formatted);
    view.moveCursor(0);
    view.markUnmodified();
    this.options.presenter.present(view);
    return view;
  }

  private requireActiveView(): { view: View; state: ViewState } {
    const view = this.options.views.active;
    if (!view || !view.state) {
      throw new NoActiveViewError();
    }
    return { view, state: view.state };
  }

  private renameView(view: View, state: ViewState): void {
    const { views, home } = this.options;
    views.rename(view, deriveName(state, views.names(), { home, ignore: view.name }));
  }

  private async executeAndPresent(state: ViewState, view: View): Promise<void> {
    await this.options.executor.execute(state, view);
    this.options.views.activate(view.name);
    this.options.presenter.present(view);
  }
}
