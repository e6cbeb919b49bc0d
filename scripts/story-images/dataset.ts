import { promises as fs } from 'fs';
import { describeDatasetIssues, isStoryDataset, storyDatasetSchema } from '@/shared/validators/stories';
import type { StoryDataset, StoryDatasetStore } from '@/shared/types/stories';
import { ConfigError } from './errors';
import { logger } from './logger';

export class JsonStoryDatasetStore implements StoryDatasetStore {
  constructor(readonly location: string) {}

  async load(): Promise<StoryDataset> {
    let text: string;
    try {
      text = await fs.readFile(this.location, 'utf8');
    } catch (err: unknown) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new ConfigError(`Stories file not found at ${this.location}`, 'Set STORIES_JSON_PATH to the stories JSON file.');
      }
      throw err;
    }
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new ConfigError(`Stories file ${this.location} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (isStoryDataset(json)) {
      return json;
    }
    const parsed = storyDatasetSchema.safeParse(json);
    const issues = parsed.success ? 'unknown' : describeDatasetIssues(parsed.error);
    throw new ConfigError(`Stories file ${this.location} has an unexpected shape: ${issues}`);
  }

  async save(dataset: StoryDataset): Promise<void> {
    await fs.writeFile(this.location, `${JSON.stringify(dataset, null, 2)}\n`, 'utf8');
    logger.info('Saved stories file', { path: this.location, stories: dataset.stories.length });
  }
}
