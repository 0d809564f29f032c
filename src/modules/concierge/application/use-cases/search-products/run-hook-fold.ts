import { createLogger } from '../../../../../common/utils/logger';
import { PluginHookError } from '../../../domain/errors';
import { cloneSearchContext, type SearchContext } from '../../../domain/search-context';
import type { HookStage, PluginFailure } from '../../../domain/search-result';
import type { MetricsPort } from '../../ports/metrics.port';
import type { ConciergePlugin, HookDescriptor, HookValueMap, PluginServices } from '../../plugins/plugin';

const logger = createLogger('PluginHookFold');

export interface HookFoldInput<S extends HookStage> {
  hook: HookDescriptor<S>;
  plugins: readonly ConciergePlugin[];
  value: HookValueMap[S];
  context: SearchContext;
  services: PluginServices;
  /** Shared across every fold of one request; appended to on failure. */
  failures: PluginFailure[];
  requestId?: string;
  metrics?: MetricsPort;
}

export interface HookFoldOutput<S extends HookStage> {
  value: HookValueMap[S];
  context: SearchContext;
}

/**
 * Left fold of one hook over the plugin sequence.
 *
 * Each step works on copies of the value and the context. The copies are
 * committed only when the hook returns a value of the expected shape, so a
 * failing plugin leaves no trace. A plugin that failed earlier in the
 * request is skipped.
 */
export async function runHookFold<S extends HookStage>(
  input: HookFoldInput<S>,
): Promise<HookFoldOutput<S>> {
  let value = input.value;
  let context = input.context;

  for (const plugin of input.plugins) {
    const hook = input.hook.resolve(plugin);
    if (!hook || hasFailed(input.failures, plugin.name)) {
      continue;
    }

    const startedAt = Date.now();
    try {
      const contextSnapshot = cloneSearchContext(context);
      const returned = await hook(structuredClone(value), contextSnapshot, input.services);

      if (!input.hook.accepts(returned)) {
        throw new PluginHookError(
          plugin.name,
          input.hook.stage,
          `Plugin "${plugin.name}" returned an invalid value from ${input.hook.stage}`,
        );
      }

      value = structuredClone(returned);
      context = cloneSearchContext(contextSnapshot);
      logger.performance(`${plugin.name}.${input.hook.stage}`, startedAt, {
        request_id: input.requestId ?? null,
      });
    } catch (error: unknown) {
      const failure: PluginFailure = {
        plugin: plugin.name,
        stage: input.hook.stage,
        message: error instanceof Error ? error.message : String(error),
      };
      input.failures.push(failure);
      input.metrics?.incrementPluginFailure({ plugin: plugin.name, stage: input.hook.stage });
      logger.warn('plugin_hook_failed', {
        event: 'plugin_hook_failed',
        request_id: input.requestId ?? null,
        plugin: failure.plugin,
        stage: failure.stage,
        error_message: failure.message,
        duration_ms: Date.now() - startedAt,
      });
    }
  }

  return { value, context };
}

function hasFailed(failures: readonly PluginFailure[], pluginName: string): boolean {
  return failures.some((failure) => failure.plugin === pluginName);
}
