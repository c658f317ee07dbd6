import type { FactId } from '@curator/shared';

export class EmbeddingUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmbeddingUnavailableError';
  }
}

export class UnknownFactError extends Error {
  readonly fact_id: FactId;

  constructor(fact_id: FactId) {
    super(`Fact ${fact_id} not found`);
    this.name = 'UnknownFactError';
    this.fact_id = fact_id;
  }
}

export class StorageUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageUnavailableError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// Ingestion reports duplicates as a value; this class is the value's shape
export class DuplicateFactError extends Error {
  readonly existing_id: FactId;
  readonly similarity: number;

  constructor(existing_id: FactId, similarity: number) {
    super(`Content is a near-duplicate of fact ${existing_id} (similarity ${similarity.toFixed(3)})`);
    this.name = 'DuplicateFactError';
    this.existing_id = existing_id;
    this.similarity = similarity;
  }
}

export function error_message(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
