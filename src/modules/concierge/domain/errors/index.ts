export {
  ExternalServiceError,
  type ExternalServiceEndpointGroup,
  type ExternalServiceErrorCode,
  type ExternalServiceErrorContext,
  type ExternalServiceName,
} from './external-service.error';
export { PipelineStageError } from './pipeline-stage.error';
export { PluginHookError } from './plugin-hook.error';
export { SearchValidationError } from './search-validation.error';
export { StockItemError } from './stock-item.error';
