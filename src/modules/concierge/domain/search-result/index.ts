export {
  buildFailedOutcome,
  buildSearchOutcome,
  failedPluginNames,
  isConciergeResult,
  type ConciergeResult,
  type HookStage,
  type PipelineStage,
  type PluginFailure,
  type SearchError,
  type SearchOutcome,
  type SearchStatus,
} from './search-result';
