import { RegistryConfigError } from './errors.js';

export interface CommandDescriptor {
  /**
   * Single selector character shown by the picker.
   */
  readonly key: string;
  readonly program: string;
  /**
   * Flag that takes the numeric line count, e.g. `--lines`.
   */
  readonly lineFlag: string;
  readonly extraArgs: readonly string[];
  /**
   * When true the program is only ever invoked with exactly one file.
   */
  readonly singleFileOnly: boolean;
}

export const DEFAULT_HELP_KEY = '?';

export const DEFAULT_COMMANDS: readonly CommandDescriptor[] = [
  { key: 'h', program: 'head', lineFlag: '--lines', extraArgs: [], singleFileOnly: false },
  { key: 't', program: 'tail', lineFlag: '--lines', extraArgs: [], singleFileOnly: false },
  // shuf reads at most one input file.
  { key: 's', program: 'shuf', lineFlag: '--head-count', extraArgs: [], singleFileOnly: true },
];

export class CommandRegistry {
  private readonly commandsByKey = new Map<string, CommandDescriptor>();
  readonly helpKey: string;

  constructor(descriptors: readonly CommandDescriptor[], helpKey: string = DEFAULT_HELP_KEY) {
    if ([...helpKey].length !== 1) {
      throw new RegistryConfigError(`Help key must be a single character: "${helpKey}"`);
    }
    this.helpKey = helpKey;

    for (const descriptor of descriptors) {
      const { key } = descriptor;
      if ([...key].length !== 1) {
        throw new RegistryConfigError(`Command key must be a single character: "${key}"`);
      }
      if (key === helpKey) {
        throw new RegistryConfigError(`Command key "${key}" is reserved for help`);
      }
      if (this.commandsByKey.has(key)) {
        throw new RegistryConfigError(`Duplicate command key in registry: ${key}`);
      }
      if (descriptor.program.trim().length === 0) {
        throw new RegistryConfigError(`Command "${key}" has an empty program`);
      }
      if (descriptor.lineFlag.trim().length === 0) {
        throw new RegistryConfigError(`Command "${key}" has an empty line flag`);
      }
      this.commandsByKey.set(
        key,
        Object.freeze({ ...descriptor, extraArgs: Object.freeze([...descriptor.extraArgs]) }),
      );
    }

    if (this.commandsByKey.size === 0) {
      throw new RegistryConfigError('Command registry must contain at least one command');
    }
  }

  lookup(key: string): CommandDescriptor | undefined {
    return this.commandsByKey.get(key);
  }

  list(): CommandDescriptor[] {
    return Array.from(this.commandsByKey.values());
  }

  keys(): string[] {
    return Array.from(this.commandsByKey.keys());
  }
}
