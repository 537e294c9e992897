import { PreconditionFailedException } from '@nestjs/common';

/**
 * Raised when no vocabulary snapshot is loaded or opening one failed.
 * Read paths catch it and degrade to empty results.
 */
export class StoreUnavailableError extends Error {
  constructor(message = 'Vocabulary snapshot is not loaded') {
    super(message);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Raised by the enrichment write path when it cannot run. Surfaces as HTTP 412.
 */
export class EnrichmentPreconditionError extends PreconditionFailedException {
  constructor(public readonly precondition: string) {
    super(`Mapping enrichment precondition failed: ${precondition}`);
    this.name = 'EnrichmentPreconditionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
