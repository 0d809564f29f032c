import { getContact, getCredential, type SearchContext } from '../../domain/search-context';
import type { ConciergeResult } from '../../domain/search-result';
import type { ConciergePlugin, PluginServices } from './plugin';

export interface FlowTriggerOptions {
  flowUuid?: string;
  params?: Record<string, unknown>;
}

export class FlowTriggerPlugin implements ConciergePlugin {
  readonly name = 'flow_trigger';
  private readonly flowUuid?: string;
  private readonly params: Record<string, unknown>;

  constructor(options: FlowTriggerOptions = {}) {
    this.flowUuid = options.flowUuid;
    this.params = options.params ?? { executions: 1 };
  }

  async finalizeResult(
    result: ConciergeResult,
    context: SearchContext,
    services: PluginServices,
  ): Promise<ConciergeResult> {
    const flowUuid = this.flowUuid ?? getCredential(context, 'FLOW_UUID');
    const contactUrn = getContact(context, 'urn');
    if (!flowUuid || !contactUrn) {
      return result;
    }

    await services.messaging.triggerFlow({
      flowUuid,
      contactUrn,
      params: { ...this.params },
      authToken: getCredential(context, 'FLOW_API_TOKEN'),
    });

    return {
      ...result,
      extras: { ...result.extras, flowTriggered: true },
    };
  }
}
