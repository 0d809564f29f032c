import type { PipelineStage } from '../search-result';
import { ExternalServiceError } from './external-service.error';

/**
 * A collaborator failure that aborts the request, tagged with the stage
 * that was running.
 */
export class PipelineStageError extends Error {
  readonly code: string;

  constructor(
    public readonly stage: PipelineStage,
    public readonly cause: unknown,
  ) {
    super(resolveCauseMessage(cause));
    this.name = 'PipelineStageError';
    this.code = resolveCauseCode(cause);
  }
}

function resolveCauseMessage(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }

  return String(cause);
}

function resolveCauseCode(cause: unknown): string {
  if (cause instanceof ExternalServiceError) {
    const service = cause.context?.service ?? 'external';
    return `${service}_${cause.errorCode}`;
  }

  return 'internal_error';
}
