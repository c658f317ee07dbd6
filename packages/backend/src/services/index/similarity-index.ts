import type { FactId } from '@curator/shared';
import { ValidationError } from '../../lib/errors.js';

export interface ScoredId {
  id: FactId;
  score: number;
}

export interface IndexEntry {
  id: FactId;
  embedding: readonly number[];
}

interface StoredVector {
  vector: Float64Array;
  norm_sq: number;
}

function squared_norm(vector: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i += 1) {
    const v = vector[i] ?? 0;
    sum += v * v;
  }
  return sum;
}

function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

// One square root over the product keeps a vector's similarity with itself at exactly 1
function cosine_from(dot_product: number, norm_sq_a: number, norm_sq_b: number): number {
  if (norm_sq_a === 0 || norm_sq_b === 0) return 0;
  const score = dot_product / Math.sqrt(norm_sq_a * norm_sq_b);
  return Math.min(1, Math.max(-1, score));
}

// Zero vectors have no direction; they are scored 0 against everything
export function cosine_similarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) return 0;
  return cosine_from(dot(a, b), squared_norm(a), squared_norm(b));
}

// Best-first; equal scores go to the lower (earlier) id
function compare_scored(a: ScoredId, b: ScoredId): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.id - b.id;
}

/**
 * Exact in-memory nearest-neighbour index over fact embeddings.
 *
 * Every query scans all vectors, so both top-k ranking and the duplicate
 * probe have exact recall. The index is derived state: it can always be
 * rebuilt from the stored embeddings with `rebuild`.
 */
export class SimilarityIndex {
  private readonly vectors = new Map<FactId, StoredVector>();
  private dimensions: number | null;

  constructor(dimensions?: number) {
    this.dimensions = dimensions ?? null;
  }

  get size(): number {
    return this.vectors.size;
  }

  has(id: FactId): boolean {
    return this.vectors.has(id);
  }

  ids(): FactId[] {
    return [...this.vectors.keys()].sort((a, b) => a - b);
  }

  upsert(id: FactId, embedding: readonly number[]): void {
    this.assert_compatible(embedding);
    this.check_dimensions(embedding);
    const vector = Float64Array.from(embedding);
    this.vectors.set(id, { vector, norm_sq: squared_norm(vector) });
  }

  remove(id: FactId): void {
    this.vectors.delete(id);
  }

  clear(): void {
    this.vectors.clear();
  }

  // Builds the replacement off to the side; a bad entry leaves the index untouched
  rebuild(entries: Iterable<IndexEntry>): number {
    const next = new SimilarityIndex(this.dimensions ?? undefined);
    for (const entry of entries) {
      next.upsert(entry.id, entry.embedding);
    }
    this.vectors.clear();
    for (const [id, stored] of next.vectors) {
      this.vectors.set(id, stored);
    }
    this.dimensions = next.dimensions;
    return this.vectors.size;
  }

  query(embedding: readonly number[], k: number): ScoredId[] {
    if (k <= 0 || this.vectors.size === 0) return [];
    this.check_dimensions(embedding);

    const query_norm_sq = squared_norm(embedding);
    const top: ScoredId[] = [];

    for (const [id, stored] of this.vectors) {
      const candidate = { id, score: cosine_from(dot(embedding, stored.vector), query_norm_sq, stored.norm_sq) };
      if (top.length < k) {
        insert_sorted(top, candidate);
        continue;
      }
      const worst = top[top.length - 1];
      if (worst && compare_scored(candidate, worst) < 0) {
        top.pop();
        insert_sorted(top, candidate);
      }
    }

    return top;
  }

  /**
   * Duplicate probe: the nearest stored vector (lower id on ties) when its
   * similarity is at least `threshold`, otherwise null. Ids in `exclude`
   * are skipped.
   */
  find_at_or_above(
    embedding: readonly number[],
    threshold: number,
    exclude: ReadonlySet<FactId> = new Set(),
  ): ScoredId | null {
    if (this.vectors.size === 0) return null;
    this.check_dimensions(embedding);

    const query_norm_sq = squared_norm(embedding);
    let best: ScoredId | null = null;
    for (const [id, stored] of this.vectors) {
      if (exclude.has(id)) continue;
      const candidate = { id, score: cosine_from(dot(embedding, stored.vector), query_norm_sq, stored.norm_sq) };
      if (!best || compare_scored(candidate, best) < 0) {
        best = candidate;
      }
    }
    return best && best.score >= threshold ? best : null;
  }

  // Throws whatever `upsert` would throw for this vector, without touching the index
  assert_compatible(embedding: readonly number[]): void {
    if (embedding.some((v) => !Number.isFinite(v))) {
      throw new ValidationError('Embedding must contain only finite numbers');
    }
    if (embedding.length === 0) {
      throw new ValidationError('Embedding must not be empty');
    }
    if (this.dimensions !== null && embedding.length !== this.dimensions) {
      throw new ValidationError(
        `Embedding has ${embedding.length} dimensions, index expects ${this.dimensions}`,
      );
    }
  }

  private check_dimensions(embedding: readonly number[]): void {
    if (embedding.length === 0) {
      throw new ValidationError('Embedding must not be empty');
    }
    if (this.dimensions === null) {
      this.dimensions = embedding.length;
      return;
    }
    if (embedding.length !== this.dimensions) {
      throw new ValidationError(
        `Embedding has ${embedding.length} dimensions, index expects ${this.dimensions}`,
      );
    }
  }
}

function insert_sorted(list: ScoredId[], item: ScoredId): void {
  let i = list.length;
  while (i > 0) {
    const prev = list[i - 1];
    if (!prev || compare_scored(prev, item) <= 0) break;
    i -= 1;
  }
  list.splice(i, 0, item);
}
