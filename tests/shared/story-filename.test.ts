import { describe, expect, it } from 'vitest';
import {
  buildStoryCoverPath,
  buildStoryImageFilename,
  isStoredCoverUrl,
  sanitizeStoryTitle,
} from '@/shared/stories/filename';

describe('sanitizeStoryTitle', () => {
  it('drops punctuation and turns spaces into underscores', () => {
    expect(sanitizeStoryTitle('The Lost Cat!')).toBe('The_Lost_Cat');
  });

  it('trims trailing spaces left behind by removed characters', () => {
    expect(sanitizeStoryTitle('Hello, World? ')).toBe('Hello_World');
  });

  it('replaces every space instead of collapsing runs', () => {
    expect(sanitizeStoryTitle('Sun ☀ Day')).toBe('Sun__Day');
    expect(sanitizeStoryTitle('a-b_c  d')).toBe('a-b_c__d');
  });

  it('keeps non-latin letters and digits', () => {
    expect(sanitizeStoryTitle('القط الصغير 2')).toBe('القط_الصغير_2');
  });

  it('caps the sanitized title at 50 characters', () => {
    expect(sanitizeStoryTitle('A'.repeat(60))).toBe('A'.repeat(50));
    expect(sanitizeStoryTitle(`${'B'.repeat(49)} tail`)).toBe(`${'B'.repeat(49)}_`);
  });
});

describe('buildStoryImageFilename', () => {
  it('prefixes a zero padded index', () => {
    expect(buildStoryImageFilename(7, 'The Lost Cat!')).toBe('story_007_The_Lost_Cat.png');
    expect(buildStoryImageFilename(42, 'Moon')).toBe('story_042_Moon.png');
  });

  it('does not truncate indices wider than three digits', () => {
    expect(buildStoryImageFilename(1234, 'Moon')).toBe('story_1234_Moon.png');
  });

  it('places uploads under the covers prefix', () => {
    expect(buildStoryCoverPath('story_007_The_Lost_Cat.png')).toBe('story_covers/story_007_The_Lost_Cat.png');
  });
});

describe('isStoredCoverUrl', () => {
  it('recognizes urls carrying the storage marker', () => {
    expect(isStoredCoverUrl('https://storage.googleapis.com/demo.firebasestorage.app/story_covers/a.png')).toBe(true);
  });

  it('rejects empty and generic urls', () => {
    expect(isStoredCoverUrl('https://example.com/cover.png')).toBe(false);
    expect(isStoredCoverUrl('')).toBe(false);
    expect(isStoredCoverUrl(null)).toBe(false);
    expect(isStoredCoverUrl(undefined)).toBe(false);
  });
});
