#!/usr/bin/env tsx
import { OpenAiImageClient } from '@/server/image-generation/openai';
import { createFirebaseImageStorage } from '@/server/storage';
import { CliUsageError, parseCliArgs, USAGE, type CliOptions } from './cli';
import { loadStoryImagesConfig } from './config';
import { promptConfirmation } from './confirm';
import { JsonStoryDatasetStore } from './dataset';
import { formatError, isConfigError } from './errors';
import { logger } from './logger';
import { processStory } from './processor';
import { runStoryImages } from './runner';
import { formatRunSummary } from './summary';

function printUsage(message?: string): never {
  if (message) {
    console.error(message);
    console.error('');
  }
  console.error(USAGE);
  process.exit(message ? 1 : 0);
}

function readCliOptions(): CliOptions {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) printUsage(err.message);
    throw err;
  }
}

async function main() {
  const cli = readCliOptions();
  if (cli.help) printUsage();

  const cfg = loadStoryImagesConfig();

  logger.info('Initializing Firebase storage', { serviceAccountPath: cfg.serviceAccountPath, bucket: cfg.storageBucket });
  const storage = createFirebaseImageStorage({ serviceAccountPath: cfg.serviceAccountPath, bucket: cfg.storageBucket });

  logger.info('Initializing OpenAI image client', { model: cfg.imageModel });
  const generator = new OpenAiImageClient({
    apiKey: cfg.openaiApiKey,
    baseUrl: cfg.openaiBaseUrl,
    model: cfg.imageModel,
    requestTimeoutMs: cfg.requestTimeoutMs,
  });

  const result = await runStoryImages({
    mode: cli.mode,
    confirm: cli.assumeYes ? async () => true : promptConfirmation,
    store: new JsonStoryDatasetStore(cfg.datasetPath),
    imagesDir: cfg.imagesDir,
    storyDelayMs: cfg.storyDelayMs,
    processStory: (story, index) =>
      processStory(story, index, {
        generator,
        storage,
        imagesDir: cfg.imagesDir,
        generationDelayMs: cfg.generationDelayMs,
      }),
  });

  if (result.status === 'aborted') {
    console.log('Cancelled. Nothing was generated.');
    return;
  }
  for (const line of formatRunSummary(result.summary)) {
    console.log(line);
  }
}

main().catch((err) => {
  if (isConfigError(err)) {
    console.error(`Error: ${err.message}`);
    if (err.hint) console.error(err.hint);
    process.exit(1);
  }
  logger.error('Story image run failed', { error: formatError(err) });
  console.error(err);
  process.exit(1);
});
