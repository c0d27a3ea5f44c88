import { describe, it, expect } from 'vitest';
import { ChunkJsonFormatter } from '../src/output/json-formatter';
import { parseChunkRecord, toChunkRecord } from '../src/output/chunk-record';
import { chunkText } from '../src/chunking/emitter';
import type { Chunk } from '../src/chunking/types';
import { ValidationError } from '../src/errors/index';

function makeChunk(overrides: Partial<Chunk> = {}): Chunk {
  return {
    documentId: 'doc-1',
    sequenceIndex: 0,
    text: 'Hello world.',
    sourceStartOffset: 0,
    sourceEndOffset: 12,
    measuredSize: 12,
    oversized: false,
    overlapLength: 0,
    headingPath: [],
    ...overrides,
  };
}

describe('toChunkRecord', () => {
  it('maps a chunk to a snake_case export record', () => {
    expect(toChunkRecord(makeChunk({ sequenceIndex: 3, headingPath: ['Intro'] }))).toEqual({
      document_id: 'doc-1',
      sequence_index: 3,
      text: 'Hello world.',
      source_start_offset: 0,
      source_end_offset: 12,
      measured_size: 12,
      oversized: false,
    });
  });
});

describe('parseChunkRecord', () => {
  it('accepts a valid record', () => {
    const record = toChunkRecord(makeChunk());
    expect(parseChunkRecord(JSON.parse(JSON.stringify(record)))).toEqual(record);
  });

  it('rejects a record whose range runs backwards', () => {
    const record = { ...toChunkRecord(makeChunk()), source_start_offset: 20 };
    expect(() => parseChunkRecord(record)).toThrow(ValidationError);
    expect(() => parseChunkRecord(record)).toThrow(
      'Invalid chunk record: source_end_offset: source_end_offset must not precede source_start_offset'
    );
  });

  it('rejects a record with missing fields', () => {
    expect(() => parseChunkRecord({ document_id: 'doc-1' })).toThrow(ValidationError);
  });
});

describe('ChunkJsonFormatter', () => {
  it('groups records per document with a summary', () => {
    const formatter = new ChunkJsonFormatter();
    formatter.addChunks(chunkText('Para one sentence A. Sentence B.\n\nPara two.', 'recursive', 20, 0, {}, 'a'));
    formatter.addChunk(makeChunk({ documentId: 'b', oversized: true }));

    const result = formatter.toResult(new Date('2026-01-02T03:04:05.000Z'));

    expect(Object.keys(result.documents)).toEqual(['a', 'b']);
    expect(result.documents['a']?.chunks.map((c) => c.text)).toEqual([
      'Para one sentence A.',
      ' Sentence B.',
      'Para two.',
    ]);
    expect(result.summary).toEqual({ documents: 2, chunks: 4, oversized: 1 });
    expect(result.metadata).toEqual({ version: '1.0', timestamp: '2026-01-02T03:04:05.000Z' });
  });

  it('renders valid JSON', () => {
    const formatter = new ChunkJsonFormatter();
    formatter.addChunk(makeChunk());

    const parsed: unknown = JSON.parse(formatter.toJson(new Date(0)));
    expect(parsed).toEqual({
      documents: { 'doc-1': { chunks: [toChunkRecord(makeChunk())] } },
      summary: { documents: 1, chunks: 1, oversized: 0 },
      metadata: { version: '1.0', timestamp: '1970-01-01T00:00:00.000Z' },
    });
  });

  it('renders one record per line', () => {
    const formatter = new ChunkJsonFormatter();
    formatter.addChunk(makeChunk());
    formatter.addChunk(makeChunk({ sequenceIndex: 1, text: 'Next.', sourceStartOffset: 12, sourceEndOffset: 17 }));

    const lines = formatter.toJsonLines().split('\n');
    expect(lines).toHaveLength(2);
    expect(parseChunkRecord(JSON.parse(lines[1] ?? '')).text).toBe('Next.');
  });

  it('returns an export that later changes do not reach', () => {
    const formatter = new ChunkJsonFormatter();
    formatter.addChunk(makeChunk());

    const first = formatter.toResult(new Date(0));
    first.documents['doc-1']?.chunks.push(toChunkRecord(makeChunk({ sequenceIndex: 1 })));
    const record = first.documents['doc-1']?.chunks[0];
    if (record) record.text = 'changed';
    delete first.documents['doc-1'];

    const second = formatter.toResult(new Date(0));
    expect(second.documents).toEqual({ 'doc-1': { chunks: [toChunkRecord(makeChunk())] } });
    expect(second.summary).toEqual({ documents: 1, chunks: 1, oversized: 0 });
  });

  it('renders an empty export', () => {
    const result = new ChunkJsonFormatter().toResult(new Date(0));
    expect(result.documents).toEqual({});
    expect(result.summary).toEqual({ documents: 0, chunks: 0, oversized: 0 });
    expect(new ChunkJsonFormatter().toJsonLines()).toBe('');
  });
});
