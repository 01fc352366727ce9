import { BaseError } from './base.error';

export type Collaborator = 'blob-store' | 'vector-index' | 'inference' | 'http';

/**
 * Collaborator error - a blob store, vector index or inference call failed
 */
export class CollaboratorError extends BaseError {
  readonly collaborator: Collaborator;

  constructor(
    collaborator: Collaborator,
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, 'COLLABORATOR_ERROR', 502, { collaborator, ...context }, { cause });
    this.collaborator = collaborator;
  }
}
