export const FAKE_VECTOR_SIZE = 64;

/**
 * Deterministic embedder: a bag of hashed character trigrams. Texts that
 * share spelling end up close, which is enough for fuzzy title matching.
 */
export class FakeEmbeddings {
  readonly embedded: string[] = [];

  async generateEmbedding(text: string): Promise<number[]> {
    this.embedded.push(text);
    return embed(text);
  }

  async generateBatchEmbeddings(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const text of texts) {
      vectors.push(await this.generateEmbedding(text));
    }
    return vectors;
  }
}

export function embed(text: string): number[] {
  const vector = new Array<number>(FAKE_VECTOR_SIZE).fill(0);
  const padded = ` ${text.toLowerCase()} `;
  for (let i = 0; i + 3 <= padded.length; i++) {
    vector[hash(padded.slice(i, i + 3)) % FAKE_VECTOR_SIZE] += 1;
  }
  // Keep empty input off the zero vector
  vector[0] += 0.01;
  return vector;
}

function hash(s: string): number {
  let h = 0;
  for (let i = 0; i < s.length; i++) {
    h = (h * 31 + s.charCodeAt(i)) >>> 0;
  }
  return h;
}
