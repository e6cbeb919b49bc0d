import type { z } from 'zod';
import type { storyDatasetSchema, storyRecordSchema } from '@/shared/validators/stories';

export type StoryRecord = z.infer<typeof storyRecordSchema>;

export type StoryDataset = z.infer<typeof storyDatasetSchema>;

export type StoryRunMode =
  | { kind: 'test' }
  | { kind: 'level'; level: number }
  | { kind: 'all' }
  | { kind: 'window'; start: number; count: number };

export type StoryFailureCode = 'missing_prompt' | 'generation_failed' | 'local_write_failed' | 'upload_failed';

export type StoryOutcome =
  | { status: 'uploaded'; url: string; generated: boolean }
  | { status: 'complete'; url: string }
  | { status: 'failed'; code: StoryFailureCode; error: string };

export interface StoryImageGenerator {
  generate(prompt: string): Promise<Uint8Array>;
}

export interface StoryImageStorage {
  upload(localPath: string, remotePath: string): Promise<string>;
}

export interface StoryDatasetStore {
  readonly location: string;
  load(): Promise<StoryDataset>;
  save(dataset: StoryDataset): Promise<void>;
}
