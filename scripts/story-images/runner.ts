import { CHECKPOINT_EVERY_SUCCESSES, estimateImageCost } from '@/shared/constants/image-generation';
import { describeRunMode, selectStoryIndices } from '@/shared/stories/selection';
import type { StoryDataset, StoryDatasetStore, StoryOutcome, StoryRecord, StoryRunMode } from '@/shared/types/stories';
import { logger } from './logger';
import { sleep as defaultSleep, type Sleep } from './processor';
import { formatCost, RunTally, type RunSummary } from './summary';

export type ConfirmFn = (question: string) => Promise<boolean>;

export type StoryRunPlan =
  | { status: 'ready'; indices: number[] }
  | { status: 'aborted' };

export type ProcessStoryFn = (story: StoryRecord, index: number) => Promise<StoryOutcome>;

export type BatchOptions = {
  dataset: StoryDataset;
  indices: readonly number[];
  store: StoryDatasetStore;
  processStory: ProcessStoryFn;
  imagesDir: string;
  storyDelayMs: number;
  checkpointEvery?: number;
  sleep?: Sleep;
  now?: () => Date;
};

export type StoryImagesRunOptions = Omit<BatchOptions, 'dataset' | 'indices'> & {
  mode: StoryRunMode;
  confirm: ConfirmFn;
};

export type StoryImagesRunResult =
  | { status: 'done'; summary: RunSummary }
  | { status: 'aborted' };

export async function planStoryRun(mode: StoryRunMode, stories: readonly StoryRecord[], confirm: ConfirmFn): Promise<StoryRunPlan> {
  const indices = selectStoryIndices(mode, stories);
  logger.info(describeRunMode(mode, indices));
  if (mode.kind === 'all') {
    const estimate = formatCost(estimateImageCost(indices.length));
    logger.warn('This will take a long time and cost money', { stories: indices.length, estimatedCost: estimate });
    const accepted = await confirm(`Generate ${indices.length} images (~${estimate}). Type 'yes' to continue: `);
    if (!accepted) {
      logger.info('Cancelled.');
      return { status: 'aborted' };
    }
  }
  return { status: 'ready', indices };
}

function recordCover(story: StoryRecord, url: string, now: Date) {
  story.coverImageURL = url;
  story.updatedAt = now.toISOString();
}

export async function runStoryImageBatch(options: BatchOptions): Promise<RunSummary> {
  const { dataset, indices, store } = options;
  const checkpointEvery = options.checkpointEvery ?? CHECKPOINT_EVERY_SUCCESSES;
  const wait = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());
  const tally = new RunTally();

  for (const [position, index] of indices.entries()) {
    const story = dataset.stories[index];
    logger.info(`[${position + 1}/${indices.length}] Story ${index}`, { id: story.id, title: story.title });

    const outcome = await options.processStory(story, index);
    tally.record(outcome);

    if (outcome.status === 'uploaded') {
      recordCover(story, outcome.url, now());
    }
    if (outcome.status !== 'failed' && tally.successCount % checkpointEvery === 0) {
      logger.info('Checkpoint', { successCount: tally.successCount });
      await store.save(dataset);
    }

    if (position < indices.length - 1) {
      await wait(options.storyDelayMs);
    }
  }

  await store.save(dataset);
  return tally.snapshot(indices.length, options.imagesDir);
}

export async function runStoryImages(options: StoryImagesRunOptions): Promise<StoryImagesRunResult> {
  logger.info('Loading stories', { path: options.store.location });
  const dataset = await options.store.load();
  logger.info('Stories loaded', { total: dataset.stories.length });

  const plan = await planStoryRun(options.mode, dataset.stories, options.confirm);
  if (plan.status === 'aborted') {
    return plan;
  }
  const summary = await runStoryImageBatch({ ...options, dataset, indices: plan.indices });
  return { status: 'done', summary };
}
