export interface IndexHit {
  rowIndex: number;
  score: number;
}

export interface VectorIndex {
  readonly size: number;
  readonly dimension: number;
  /** Hits ordered by descending similarity. */
  search(vector: readonly number[], k: number): Promise<IndexHit[]>;
}

/**
 * Exact inner-product search. Vectors are expected to be L2-normalized, which
 * makes the inner product equal to cosine similarity.
 */
export class FlatInnerProductIndex implements VectorIndex {
  private constructor(
    private readonly vectors: ReadonlyArray<readonly number[]>,
    readonly dimension: number
  ) {}

  static build(vectors: ReadonlyArray<readonly number[]>): FlatInnerProductIndex {
    if (vectors.length === 0) {
      throw new Error("Cannot build a vector index from an empty corpus");
    }
    const dimension = vectors[0].length;
    if (dimension === 0) {
      throw new Error("Embedding vectors must not be empty");
    }
    vectors.forEach((vector, index) => {
      if (vector.length !== dimension) {
        throw new Error(`Embedding ${index} has dimension ${vector.length}, expected ${dimension}`);
      }
    });
    return new FlatInnerProductIndex(vectors.map((vector) => Object.freeze([...vector])), dimension);
  }

  get size(): number {
    return this.vectors.length;
  }

  async search(vector: readonly number[], k: number): Promise<IndexHit[]> {
    if (vector.length !== this.dimension) {
      throw new Error(`Query vector has dimension ${vector.length}, index expects ${this.dimension}`);
    }
    const limit = Math.max(0, Math.min(Math.floor(k), this.vectors.length));
    if (limit === 0) {
      return [];
    }

    const hits = this.vectors.map((stored, rowIndex) => ({ rowIndex, score: innerProduct(stored, vector) }));
    hits.sort((left, right) => right.score - left.score || left.rowIndex - right.rowIndex);
    return hits.slice(0, limit);
  }
}

function innerProduct(left: readonly number[], right: readonly number[]): number {
  let total = 0;
  for (let i = 0; i < left.length; i += 1) {
    total += left[i] * right[i];
  }
  return total;
}
