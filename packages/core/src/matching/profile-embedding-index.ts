import type { Profile } from "../graph/profile-types.ts";
import type { Embedder, Embedding } from "./collaborators.ts";
import { formatProfileDocument } from "./profile-document.ts";

export const DOCUMENT_EMBEDDING_BATCH_SIZE = 96;

export type ProfileEmbeddingIndex = {
  /** Embeddings for every profile of `generation`, built on first use. */
  embeddingsFor(
    generation: number,
    profiles: readonly Profile[],
  ): Promise<ReadonlyMap<string, Embedding>>;
};

export function createProfileEmbeddingIndex(options: {
  embedder: Embedder;
  batchSize?: number;
}): ProfileEmbeddingIndex {
  const batchSize = Math.max(1, options.batchSize ?? DOCUMENT_EMBEDDING_BATCH_SIZE);
  let cached: { generation: number; embeddings: Promise<ReadonlyMap<string, Embedding>> } | null =
    null;

  return {
    embeddingsFor(generation, profiles) {
      if (cached && cached.generation === generation) {
        return cached.embeddings;
      }

      // A failed build is evicted so the next call for the same generation retries it.
      const embeddings: Promise<ReadonlyMap<string, Embedding>> = embedAll(
        options.embedder,
        profiles,
        batchSize,
      ).catch((error: unknown) => {
        if (cached?.embeddings === embeddings) {
          cached = null;
        }
        throw error;
      });
      cached = { generation, embeddings };
      return embeddings;
    },
  };
}

async function embedAll(
  embedder: Embedder,
  profiles: readonly Profile[],
  batchSize: number,
): Promise<ReadonlyMap<string, Embedding>> {
  const embeddings = new Map<string, Embedding>();

  for (let offset = 0; offset < profiles.length; offset += batchSize) {
    const batch = profiles.slice(offset, offset + batchSize);
    const vectors = await embedder.embed(batch.map(formatProfileDocument), "document");
    if (vectors.length !== batch.length) {
      throw new Error(
        `Embedder returned ${vectors.length} vectors for ${batch.length} documents.`,
      );
    }
    batch.forEach((profile, index) => {
      const vector = vectors[index];
      if (vector) {
        embeddings.set(profile.id, vector);
      }
    });
  }

  return embeddings;
}
