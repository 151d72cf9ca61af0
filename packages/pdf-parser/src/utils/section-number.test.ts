import { describe, expect, test } from 'vitest';

import { isValidSectionTransition, parseSectionNumber } from './section-number';

describe('parseSectionNumber', () => {
  test('splits dotted numbers', () => {
    expect(parseSectionNumber('3.2.1')).toEqual([3, 2, 1]);
  });

  test('ignores a trailing dot', () => {
    expect(parseSectionNumber('4.')).toEqual([4]);
  });
});

describe('isValidSectionTransition', () => {
  test('accepts 1 as the first heading', () => {
    expect(isValidSectionTransition(null, '1')).toBe(true);
  });

  test('rejects any other number as the first heading', () => {
    expect(isValidSectionTransition(null, '2')).toBe(false);
    expect(isValidSectionTransition(null, '3')).toBe(false);
    expect(isValidSectionTransition(null, '0')).toBe(false);
  });

  test('rejects a nested number as the first heading', () => {
    expect(isValidSectionTransition(null, '1.1')).toBe(false);
  });

  test('accepts descending one level starting at 1', () => {
    expect(isValidSectionTransition('2', '2.1')).toBe(true);
    expect(isValidSectionTransition('2.1', '2.1.1')).toBe(true);
  });

  test('rejects descending into another section or past 1', () => {
    expect(isValidSectionTransition('2', '3.1')).toBe(false);
    expect(isValidSectionTransition('2', '2.2')).toBe(false);
    expect(isValidSectionTransition('2', '2.1.1')).toBe(false);
  });

  test('accepts the next sibling', () => {
    expect(isValidSectionTransition('1', '2')).toBe(true);
    expect(isValidSectionTransition('2.1', '2.2')).toBe(true);
  });

  test('accepts returning to a shallower level', () => {
    expect(isValidSectionTransition('2.1.3', '2.2')).toBe(true);
    expect(isValidSectionTransition('2.1.3', '3')).toBe(true);
  });

  test('rejects skipped and repeated numbers', () => {
    expect(isValidSectionTransition('1', '3')).toBe(false);
    expect(isValidSectionTransition('2.1', '2.3')).toBe(false);
    expect(isValidSectionTransition('2', '2')).toBe(false);
    expect(isValidSectionTransition('3', '2')).toBe(false);
  });

  test('rejects malformed numbers', () => {
    expect(isValidSectionTransition('1', '')).toBe(false);
    expect(isValidSectionTransition('1', 'a.b')).toBe(false);
  });
});
