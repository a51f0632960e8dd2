import { describe, it, expect } from 'vitest';
import type { EmbeddingBackend } from './embeddings.js';
import { VectorIndex } from './vectorIndex.js';

// Vectors keyed by the first line of each text (the path, or the whole query).
function tableBackend(table: Record<string, number[]>): EmbeddingBackend & { seen: string[] } {
  const seen: string[] = [];
  return {
    name: 'table',
    seen,
    async embed(texts) {
      return texts.map((t) => {
        seen.push(t);
        const key = t.split('\n')[0];
        return table[key] ?? [0, 0, 1];
      });
    },
  };
}

const TABLE: Record<string, number[]> = {
  'src/app.ts': [1, 0, 0],
  'src/b.ts': [0.8, 0.6, 0],
  'src/c.ts': [0, 1, 0],
  'lib/aa.ts': [0.8, 0.6, 0],
  query: [1, 0, 0],
};

describe('VectorIndex', () => {
  it('ranks by similarity, then shorter path, then insertion order', async () => {
    const index = new VectorIndex(tableBackend(TABLE));
    const res = await index.index(['src/app.ts', 'lib/aa.ts', 'src/b.ts', 'src/c.ts'], new Map());
    expect(res).toEqual({ ok: true, count: 4 });

    const hits = await index.query('query', 10);
    expect(hits.map((h) => h.path)).toEqual(['src/app.ts', 'src/b.ts', 'lib/aa.ts', 'src/c.ts']);
    expect(hits[0].similarity).toBeCloseTo(1);
    expect(hits[1].similarity).toBeCloseTo(0.8);
    expect(hits[3].similarity).toBe(0);
  });

  it('returns at most k hits', async () => {
    const index = new VectorIndex(tableBackend(TABLE));
    await index.index(Object.keys(TABLE), new Map());
    expect(await index.query('query', 2)).toHaveLength(2);
    expect(await index.query('query', 0)).toEqual([]);
  });

  it('embeds a bounded prefix of each file', async () => {
    const backend = tableBackend(TABLE);
    const index = new VectorIndex(backend, { prefixChars: 5 });
    await index.index(['src/app.ts'], new Map([['src/app.ts', 'export const x = 1;']]));
    expect(backend.seen).toEqual(['src/app.ts\nexpor']);
  });

  it('related() excludes the file itself and ignores unknown paths', async () => {
    const index = new VectorIndex(tableBackend(TABLE));
    await index.index(['src/app.ts', 'src/b.ts', 'src/c.ts'], new Map());
    expect(index.related('src/app.ts', 5).map((h) => h.path)).toEqual(['src/b.ts', 'src/c.ts']);
    expect(index.related('missing.ts', 5)).toEqual([]);
  });

  it('reports mixed dimensionality as an index error', async () => {
    const index = new VectorIndex(tableBackend({ 'a.ts': [1, 0], 'b.ts': [1, 0, 0] }));
    const res = await index.index(['a.ts', 'b.ts'], new Map());
    expect(res.ok).toBe(false);
    expect(index.size).toBe(0);
  });

  it('reports backend failures as an index error', async () => {
    const backend: EmbeddingBackend = {
      name: 'down',
      async embed() {
        throw new Error('offline');
      },
    };
    const res = await new VectorIndex(backend).index(['a.ts'], new Map());
    expect(res.ok ? '' : res.error.message).toBe('offline');
  });

  it('rejects a query of the wrong dimension', async () => {
    const index = new VectorIndex(tableBackend({ 'a.ts': [1, 0], query: [1, 0, 0] }));
    await index.index(['a.ts'], new Map());
    await expect(index.query('query', 1)).rejects.toThrow('query embedding has 3 dimensions, index has 2');
  });
});
