import type { Chunk } from '../chunking/types';
import { EXPORT_FORMAT_VERSION } from '../config/constants';
import type { ChunkRecord } from '../schemas/chunk-schemas';
import { toChunkRecord } from './chunk-record';

export interface DocumentResult {
  chunks: ChunkRecord[];
}

export interface Result {
  documents: Record<string, DocumentResult>;
  summary: {
    documents: number;
    chunks: number;
    oversized: number;
  };
  metadata: {
    version: string;
    timestamp: string;
  };
}

/**
 * Collects chunk records per document and renders one JSON export for the
 * embedding stage.
 */
export class ChunkJsonFormatter {
  private documents: Record<string, DocumentResult> = {};
  private chunkCount = 0;
  private oversizedCount = 0;

  addChunk(chunk: Chunk): void {
    const entry = this.documents[chunk.documentId] ?? { chunks: [] };
    this.documents[chunk.documentId] = entry;
    entry.chunks.push(toChunkRecord(chunk));

    this.chunkCount++;
    if (chunk.oversized) {
      this.oversizedCount++;
    }
  }

  addChunks(chunks: Iterable<Chunk>): void {
    for (const chunk of chunks) {
      this.addChunk(chunk);
    }
  }

  /**
   * Snapshot of the export; later additions do not change it.
   */
  toResult(now: Date = new Date()): Result {
    const documents: Record<string, DocumentResult> = {};
    for (const [id, doc] of Object.entries(this.documents)) {
      documents[id] = { chunks: doc.chunks.map((record) => ({ ...record })) };
    }
    return {
      documents,
      summary: {
        documents: Object.keys(this.documents).length,
        chunks: this.chunkCount,
        oversized: this.oversizedCount,
      },
      metadata: {
        version: EXPORT_FORMAT_VERSION,
        timestamp: now.toISOString(),
      },
    };
  }

  toJson(now: Date = new Date()): string {
    return JSON.stringify(this.toResult(now), null, 2);
  }

  /**
   * One record per line, in insertion order.
   */
  toJsonLines(): string {
    return Object.values(this.documents)
      .flatMap((doc) => doc.chunks.map((record) => JSON.stringify(record)))
      .join('\n');
  }
}
