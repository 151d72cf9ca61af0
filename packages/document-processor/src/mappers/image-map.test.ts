import { describe, expect, test } from 'vitest';

import { ImageMap } from './image-map';

describe('ImageMap', () => {
  const map = new ImageMap(
    [
      { kind: 'uncaptioned', imageId: 'c' },
      { kind: 'captioned', imageId: 'a', captionOrdinal: 3, distance: 5 },
      { kind: 'captioned', imageId: 'b', captionOrdinal: 3, distance: 8 },
      { kind: 'uncaptioned', imageId: 'd' },
      { kind: 'uncaptioned', imageId: 'e' },
    ],
    [
      { id: 'e', followsOrdinal: null },
      { id: 'a', followsOrdinal: 1 },
      { id: 'b', followsOrdinal: 1 },
      { id: 'c', followsOrdinal: 2 },
      { id: 'd', followsOrdinal: 2 },
    ],
  );

  test('lists mappings in image reading order', () => {
    expect(map.values().map((mapping) => mapping.imageId)).toEqual([
      'e',
      'a',
      'b',
      'c',
      'd',
    ]);
    expect(map.size).toBe(5);
    expect(map.has('a')).toBe(true);
    expect(map.has('z')).toBe(false);
  });

  test('finds the images sharing a caption', () => {
    expect(map.imagesForCaption(3)).toEqual(['a', 'b']);
    expect(map.imagesForCaption(1)).toEqual([]);
  });

  test('finds uncaptioned images after a block or before all blocks', () => {
    expect(map.uncaptionedAfter(2)).toEqual(['c', 'd']);
    expect(map.uncaptionedAfter(1)).toEqual([]);
    expect(map.uncaptionedAfter(null)).toEqual(['e']);
  });
});
