import type { ConciergePlugin } from './plugin';

/** Ordered, name-unique plugin list. Registration order is hook order. */
export class PluginRegistry {
  private readonly plugins: ConciergePlugin[] = [];

  constructor(plugins: readonly ConciergePlugin[] = []) {
    for (const plugin of plugins) {
      this.register(plugin);
    }
  }

  register(plugin: ConciergePlugin): this {
    const name = plugin.name.trim();
    if (name.length === 0) {
      throw new Error('Plugin name must be a non-empty string');
    }

    if (this.get(name)) {
      throw new Error(`Plugin "${name}" is already registered`);
    }

    this.plugins.push(plugin);
    return this;
  }

  list(): ConciergePlugin[] {
    return [...this.plugins];
  }

  get(name: string): ConciergePlugin | undefined {
    return this.plugins.find((plugin) => plugin.name === name);
  }

  get size(): number {
    return this.plugins.length;
  }
}
