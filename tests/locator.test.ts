import { describe, expect, it } from 'vitest';
import { resolveImageUrl, resolveImages, toAbsoluteUrl } from '../src/catalog/locator.js';
import type { SizeTag } from '../src/catalog/types.js';
import { makeRecord } from './helpers/fixtures.js';

describe('resolveImageUrl', () => {
  it('returns the preferred size when present', () => {
    const record = makeRecord('A1', { 60: 'a60.jpg', 250: 'a250.jpg', 500: 'a500.jpg' });
    expect(resolveImageUrl(record, 250)).toBe('a250.jpg');
    expect(resolveImageUrl(record, 60)).toBe('a60.jpg');
  });

  it('falls back to the largest remaining size', () => {
    const record = makeRecord('A1', { 144: 'a144.jpg', 60: 'a60.jpg', 500: 'a500.jpg' });
    expect(resolveImageUrl(record, 250)).toBe('a500.jpg');
    expect(resolveImageUrl(makeRecord('B2', { 60: 'b60.jpg', 144: 'b144.jpg' }), 500)).toBe('b144.jpg');
  });

  it('ignores map insertion order', () => {
    const ascending = makeRecord('A1', { 60: 'small.jpg', 144: 'large.jpg' });
    const descending = { externalCode: 'A1', imageVariants: new Map<SizeTag, string>([[144, 'large.jpg'], [60, 'small.jpg']]) };
    expect(resolveImageUrl(ascending, 500)).toBe('large.jpg');
    expect(resolveImageUrl(descending, 500)).toBe('large.jpg');
  });

  it('returns undefined without variants', () => {
    expect(resolveImageUrl(makeRecord('EMPTY'), 250)).toBeUndefined();
  });
});

describe('toAbsoluteUrl', () => {
  it('resolves relative paths against the base', () => {
    expect(toAbsoluteUrl('/img/a.jpg', 'https://cdn.test/base/')).toBe('https://cdn.test/img/a.jpg');
    expect(toAbsoluteUrl('img/a.jpg', 'https://cdn.test/base/')).toBe('https://cdn.test/base/img/a.jpg');
  });

  it('keeps absolute URLs', () => {
    expect(toAbsoluteUrl('https://other.test/x.jpg', 'https://cdn.test/')).toBe('https://other.test/x.jpg');
  });
});

describe('resolveImages', () => {
  it('pairs codes with absolute URLs and counts records without images', () => {
    const records = [
      makeRecord('A1', { 250: 'https://cdn.test/a.jpg' }),
      makeRecord('NOIMG'),
      makeRecord('C3', { 60: '/c60.jpg' })
    ];
    const { images, skipped } = resolveImages(records, 250, 'https://cdn.test/');
    expect(skipped).toBe(1);
    expect(images).toEqual([
      { externalCode: 'A1', url: 'https://cdn.test/a.jpg' },
      { externalCode: 'C3', url: 'https://cdn.test/c60.jpg' }
    ]);
  });
});
