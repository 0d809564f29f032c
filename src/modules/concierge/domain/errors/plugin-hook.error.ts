import type { HookStage } from '../search-result';

export class PluginHookError extends Error {
  constructor(
    public readonly plugin: string,
    public readonly stage: HookStage,
    message: string,
  ) {
    super(message);
    this.name = 'PluginHookError';
  }
}
