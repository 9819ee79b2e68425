export interface Embedding {
  /** The text that was embedded */
  document: string;
  vec: number[];
}

export interface EmbeddingModel {
  /** Largest batch `embedTexts` accepts in one call */
  readonly maxDocuments: number;

  ndims(): number;

  /** Embeddings come back in the order of `texts`. */
  embedTexts(texts: Iterable<string>): Promise<Embedding[]>;

  embedText(text: string): Promise<Embedding>;
}
