import { STORAGE_PROVENANCE_MARKER, STORY_COVERS_PREFIX } from '@/shared/constants/image-generation';

const MAX_TITLE_LENGTH = 50;
const KEPT_CHARACTER = /[\p{L}\p{N} _-]/u;

export function sanitizeStoryTitle(title: string) {
  const kept = Array.from(title)
    .filter((ch) => KEPT_CHARACTER.test(ch))
    .join('')
    .replace(/ +$/u, '');
  return Array.from(kept.replace(/ /g, '_')).slice(0, MAX_TITLE_LENGTH).join('');
}

export function buildStoryImageFilename(index: number, title: string) {
  return `story_${String(index).padStart(3, '0')}_${sanitizeStoryTitle(title)}.png`;
}

export function buildStoryCoverPath(filename: string) {
  return `${STORY_COVERS_PREFIX}${filename}`;
}

export function isStoredCoverUrl(url: string | null | undefined): url is string {
  return typeof url === 'string' && url.length > 0 && url.includes(STORAGE_PROVENANCE_MARKER);
}
