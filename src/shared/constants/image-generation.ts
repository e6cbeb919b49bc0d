export type StoryImageSize = '1024x1024' | '1792x1024' | '1024x1792';

export type StoryImageQuality = 'standard' | 'hd';

export const STORY_IMAGE_MODEL = 'dall-e-3';
export const STORY_IMAGE_SIZE: StoryImageSize = '1024x1024';
export const STORY_IMAGE_QUALITY: StoryImageQuality = 'standard';

// USD per 1024x1024 standard image.
export const STORY_IMAGE_UNIT_PRICE = 0.04;

export const STORY_IMAGE_STYLE =
  "Children's picture book illustration, warm and inviting, soft lighting, "
  + 'detailed but not overwhelming, suitable for young readers, family-friendly atmosphere.';

export const STORY_COVERS_PREFIX = 'story_covers/';

// Any cover URL containing this marker is treated as already uploaded by this tool.
export const STORAGE_PROVENANCE_MARKER = 'firebasestorage';

export const CHECKPOINT_EVERY_SUCCESSES = 5;
export const DEFAULT_GENERATION_DELAY_MS = 1000;
export const DEFAULT_STORY_DELAY_MS = 500;

export const DEFAULT_WINDOW_START = 0;
export const DEFAULT_WINDOW_COUNT = 10;

export function buildStoryImagePrompt(prompt: string) {
  return `${prompt}\n\nStyle: ${STORY_IMAGE_STYLE}`;
}

export function estimateImageCost(images: number) {
  return images * STORY_IMAGE_UNIT_PRICE;
}
