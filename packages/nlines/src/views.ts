import { ViewNameTakenError } from './errors.js';
import type { ViewState } from './viewState.js';

export class View {
  private text = '';
  private cursor = 0;
  private dirty = false;
  readonly readOnly = true;
  state: ViewState | undefined;

  constructor(public name: string) {}

  get content(): string {
    return this.text;
  }

  get cursorLine(): number {
    return this.cursor;
  }

  get modified(): boolean {
    return this.dirty;
  }

  clear(): void {
    this.text = '';
    this.cursor = 0;
    this.dirty = true;
  }

  append(chunk: string): void {
    this.text += chunk;
    this.dirty = true;
  }

  replaceContent(text: string): void {
    this.text = text;
    this.dirty = true;
    this.moveCursor(this.cursor);
  }

  lines(): string[] {
    if (this.text.length === 0) {
      return [];
    }
    const lines = this.text.split('\n');
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines;
  }

  lineAtCursor(): string | undefined {
    return this.lines()[this.cursor];
  }

  moveCursor(line: number): void {
    const lastLine = Math.max(0, this.lines().length - 1);
    this.cursor = Math.min(Math.max(0, Math.trunc(line)), lastLine);
  }

  markUnmodified(): void {
    this.dirty = false;
  }
}

export class ViewStore {
  private readonly viewsByName = new Map<string, View>();
  private activeName: string | undefined;

  get(name: string): View | undefined {
    return this.viewsByName.get(name);
  }

  getOrCreate(name: string): View {
    const existing = this.viewsByName.get(name);
    if (existing) {
      return existing;
    }
    const view = new View(name);
    this.viewsByName.set(name, view);
    return view;
  }

  rename(view: View, newName: string): void {
    if (view.name === newName) {
      return;
    }
    const holder = this.viewsByName.get(newName);
    if (holder && holder !== view) {
      throw new ViewNameTakenError(newName);
    }
    const wasActive = this.activeName === view.name;
    this.viewsByName.delete(view.name);
    view.name = newName;
    this.viewsByName.set(newName, view);
    if (wasActive) {
      this.activeName = newName;
    }
  }

  close(name: string): boolean {
    const removed = this.viewsByName.delete(name);
    if (removed && this.activeName === name) {
      this.activeName = undefined;
    }
    return removed;
  }

  names(): string[] {
    return Array.from(this.viewsByName.keys());
  }

  list(): View[] {
    return Array.from(this.viewsByName.values());
  }

  get active(): View | undefined {
    return this.activeName === undefined ? undefined : this.viewsByName.get(this.activeName);
  }

  activate(name: string): View | undefined {
    const view = this.viewsByName.get(name);
    if (view) {
      this.activeName = name;
    }
    return view;
  }
}
