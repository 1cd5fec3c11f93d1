import { describe, it, expect } from 'vitest';
import { ContextManager } from '../../../src/utils/translation/ContextManager';
import { ChunkContext, type Chunk } from '../../../src/latex/types';

function createChunks(count: number): Chunk[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `c${i}`,
    content: `Chunk ${i}`,
    context: ChunkContext.PARAGRAPH,
    preservedElements: {},
  }));
}

describe('ContextManager', () => {
  it('returns up to two chunks on each side by default', () => {
    const manager = new ContextManager(createChunks(5));

    expect(manager.getContext(2)).toEqual({
      before: [
        { id: 'c0', original: 'Chunk 0' },
        { id: 'c1', original: 'Chunk 1' },
      ],
      after: [
        { id: 'c3', original: 'Chunk 3' },
        { id: 'c4', original: 'Chunk 4' },
      ],
    });
  });

  it('includes known translations for preceding chunks only', () => {
    const manager = new ContextManager(createChunks(3), 1, 1);
    manager.addTranslation('c0', 'Morceau 0');
    manager.addTranslation('c2', 'Morceau 2');

    expect(manager.getContext(1)).toEqual({
      before: [{ id: 'c0', original: 'Chunk 0', translated: 'Morceau 0' }],
      after: [{ id: 'c2', original: 'Chunk 2' }],
    });
  });

  it('clips the window at the ends', () => {
    const manager = new ContextManager(createChunks(2));

    expect(manager.getContext(0).before).toEqual([]);
    expect(manager.getContext(1).after).toEqual([]);
  });

  it('loads existing translations for its own chunks only', () => {
    const manager = new ContextManager(createChunks(3));

    expect(manager.loadExistingTranslations({ c2: 'c', other: 'x', c0: 'a' })).toEqual(['c0', 'c2']);
    expect(manager.getCompletedCount()).toBe(2);
    expect(manager.getTotalCount()).toBe(3);
    expect(manager.hasTranslation('other')).toBe(false);
    expect(manager.getTranslation('c2')).toBe('c');
  });
});
