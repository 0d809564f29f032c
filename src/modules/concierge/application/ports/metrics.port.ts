import type { HookStage, PipelineStage, SearchStatus } from '../../domain/search-result';

export interface MetricsPort {
  incrementSearch(input: { status: SearchStatus }): void;

  incrementPluginFailure(input: { plugin: string; stage: HookStage }): void;

  incrementStockUnavailable(input: { reason: 'out_of_stock' | 'lookup_failed' }): void;

  observeStageLatency(input: { stage: PipelineStage; seconds: number }): void;
}
