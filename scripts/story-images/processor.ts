import { promises as fs } from 'fs';
import path from 'path';
import { buildStoryImagePrompt } from '@/shared/constants/image-generation';
import { buildStoryCoverPath, buildStoryImageFilename, isStoredCoverUrl } from '@/shared/stories/filename';
import type { StoryImageGenerator, StoryImageStorage, StoryOutcome, StoryRecord } from '@/shared/types/stories';
import { formatError } from './errors';
import { logger } from './logger';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type StoryProcessorDeps = {
  generator: StoryImageGenerator;
  storage: StoryImageStorage;
  imagesDir: string;
  generationDelayMs: number;
  sleep?: Sleep;
};

function shortTitle(title: string) {
  return title.length > 40 ? `${title.slice(0, 40)}...` : title;
}

async function fileExists(p: string) {
  try {
    const stats = await fs.stat(p);
    return stats.isFile();
  } catch {
    return false;
  }
}

export async function processStory(story: StoryRecord, index: number, deps: StoryProcessorDeps): Promise<StoryOutcome> {
  const log = logger.child(`story ${index}`);
  const prompt = story.imagePrompt ?? '';
  if (!prompt) {
    log.warn('No image prompt found', { title: story.title });
    return { status: 'failed', code: 'missing_prompt', error: 'Story has no image prompt' };
  }

  if (isStoredCoverUrl(story.coverImageURL)) {
    log.info('Already has a stored image, skipping', { title: shortTitle(story.title) });
    return { status: 'complete', url: story.coverImageURL };
  }

  log.info(story.title);

  const filename = buildStoryImageFilename(index, story.title);
  const localPath = path.join(deps.imagesDir, filename);

  let generated = false;
  if (await fileExists(localPath)) {
    log.info('Image already exists locally', { path: localPath });
  } else {
    log.info(`Generating image for: ${shortTitle(story.title)}`);
    let bytes: Uint8Array;
    try {
      bytes = await deps.generator.generate(buildStoryImagePrompt(prompt));
    } catch (err) {
      const error = formatError(err);
      log.error('Error generating image', { error });
      return { status: 'failed', code: 'generation_failed', error };
    }
    try {
      await fs.mkdir(deps.imagesDir, { recursive: true });
      await fs.writeFile(localPath, bytes);
    } catch (err) {
      const error = formatError(err);
      log.error('Error saving generated image', { path: localPath, error });
      return { status: 'failed', code: 'local_write_failed', error };
    }
    log.info('Image saved', { path: localPath, bytes: bytes.byteLength });
    generated = true;
    await (deps.sleep ?? sleep)(deps.generationDelayMs);
  }

  const remotePath = buildStoryCoverPath(filename);
  try {
    const url = await deps.storage.upload(localPath, remotePath);
    log.info('Uploaded to storage', { url });
    return { status: 'uploaded', url, generated };
  } catch (err) {
    const error = formatError(err);
    log.error('Error uploading image', { remotePath, error });
    return { status: 'failed', code: 'upload_failed', error };
  }
}
