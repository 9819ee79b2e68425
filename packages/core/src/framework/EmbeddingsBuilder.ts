/**
 * EmbeddingsBuilder
 *
 * Collects documents, embeds every text they yield in batches no larger than
 * the model's `maxDocuments`, and hands each document back with its
 * embeddings, in the order the documents were added.
 */

import { Logger } from '../utils/logger';
import { EmbeddingError } from './errors';
import type { Embedding, EmbeddingModel } from './embeddings';

export type EmbedTexts<T> = (document: T) => string | string[];

export interface EmbeddedDocument<T> {
  document: T;
  embeddings: Embedding[];
}

export class EmbeddingsBuilder<T> {
  private readonly pending: Array<{ document: T; texts: string[] }> = [];

  constructor(
    private readonly model: EmbeddingModel,
    private readonly toTexts: EmbedTexts<T>
  ) {}

  document(document: T): this {
    const selected = this.toTexts(document);
    const texts = typeof selected === 'string' ? [selected] : selected;
    if (texts.length === 0) {
      throw new EmbeddingError('Document has no text to embed');
    }
    this.pending.push({ document, texts });
    return this;
  }

  documents(documents: Iterable<T>): this {
    for (const document of documents) {
      this.document(document);
    }
    return this;
  }

  async build(): Promise<EmbeddedDocument<T>[]> {
    const queue = this.pending.flatMap((entry, index) =>
      entry.texts.map(text => ({ index, text }))
    );
    const results: EmbeddedDocument<T>[] = this.pending.map(({ document }) => ({
      document,
      embeddings: [],
    }));

    const batchSize = Math.max(1, this.model.maxDocuments);
    for (let start = 0; start < queue.length; start += batchSize) {
      const batch = queue.slice(start, start + batchSize);
      Logger.debug(`[EmbeddingsBuilder] Embedding batch of ${batch.length} texts`);

      const embeddings = await this.model.embedTexts(batch.map(item => item.text));
      if (embeddings.length !== batch.length) {
        throw new EmbeddingError(
          `Model returned ${embeddings.length} embeddings for ${batch.length} texts`
        );
      }
      embeddings.forEach((embedding, offset) => {
        results[batch[offset].index].embeddings.push(embedding);
      });
    }

    return results;
  }
}
