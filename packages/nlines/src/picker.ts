import type { Prompter } from './prompter.js';
import type { CommandDescriptor, CommandRegistry } from './registry.js';

export function formatHelpListing(registry: CommandRegistry): string {
  return registry
    .list()
    .map((descriptor) => `${descriptor.key}  ${descriptor.program}`)
    .join('\n');
}

export class CommandPicker {
  constructor(
    private readonly registry: CommandRegistry,
    private readonly prompter: Prompter,
  ) {}

  async choose(): Promise<CommandDescriptor> {
    const { helpKey } = this.registry;
    const choices = [...this.registry.keys(), helpKey];
    const message = `Command (${helpKey} for help):`;

    for (;;) {
      const key = await this.prompter.readKey(message, choices);
      if (key === helpKey) {
        this.prompter.showSide('nlines commands', formatHelpListing(this.registry));
        continue;
      }
      const descriptor = this.registry.lookup(key);
      if (descriptor) {
        return descriptor;
      }
    }
  }
}
