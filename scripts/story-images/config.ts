import { config as loadEnv } from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_GENERATION_DELAY_MS, DEFAULT_STORY_DELAY_MS, STORY_IMAGE_MODEL } from '@/shared/constants/image-generation';
import { OPENAI_DEFAULT_BASE_URL } from '@/server/image-generation/openai';
import { ConfigError } from './errors';

export type StoryImagesConfig = {
  openaiApiKey: string;
  openaiBaseUrl: string;
  imageModel: string;
  serviceAccountPath: string;
  storageBucket: string | null;
  datasetPath: string;
  imagesDir: string;
  generationDelayMs: number;
  storyDelayMs: number;
  requestTimeoutMs: number;
};

const RawSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1),
  OPENAI_API_BASE_URL: z.string().url().default(OPENAI_DEFAULT_BASE_URL),
  OPENAI_IMAGE_MODEL: z.string().trim().min(1).default(STORY_IMAGE_MODEL),
  FIREBASE_SERVICE_ACCOUNT_PATH: z.string().trim().min(1).default('serviceAccountKey.json'),
  FIREBASE_STORAGE_BUCKET: z.string().optional(),
  STORIES_JSON_PATH: z.string().trim().min(1).default('data/stories.json'),
  STORY_IMAGES_DIR: z.string().trim().min(1).default('generated_images'),
  STORY_IMAGES_GENERATION_DELAY_MS: z.string().optional(),
  STORY_IMAGES_STORY_DELAY_MS: z.string().optional(),
  STORY_IMAGES_REQUEST_TIMEOUT_MS: z.string().optional(),
});

const API_KEY_HINT = [
  'Get an API key from https://platform.openai.com/api-keys',
  "then run: export OPENAI_API_KEY='your-key-here' (or add it to .env)",
].join('\n');

let envLoaded = false;

function ensureEnvLoaded() {
  if (envLoaded) return;
  const explicit = process.env.STORY_IMAGES_ENV_FILE;
  const candidate = explicit ? path.resolve(process.cwd(), explicit) : path.resolve(process.cwd(), '.env');
  if (fs.existsSync(candidate)) {
    loadEnv({ path: candidate, override: false });
  }
  envLoaded = true;
}

function readInt(value: string | undefined, fallback: number, options?: { min?: number; max?: number }) {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return fallback;
  const min = options?.min ?? 0;
  const max = options?.max ?? Number.MAX_SAFE_INTEGER;
  return Math.min(Math.max(Math.floor(parsed), min), max);
}

function resolvePath(raw: string) {
  return path.isAbsolute(raw) ? raw : path.resolve(process.cwd(), raw);
}

export function loadStoryImagesConfig(): StoryImagesConfig {
  ensureEnvLoaded();
  const apiKey = process.env.OPENAI_API_KEY;
  if (!apiKey || !apiKey.trim()) {
    throw new ConfigError('OPENAI_API_KEY environment variable not set', API_KEY_HINT);
  }
  const parsed = RawSchema.safeParse(process.env);
  if (!parsed.success) {
    const flat = parsed.error.flatten();
    throw new ConfigError(`Invalid story images configuration: ${JSON.stringify(flat.fieldErrors)}`);
  }
  const raw = parsed.data;
  const serviceAccountPath = resolvePath(raw.FIREBASE_SERVICE_ACCOUNT_PATH);
  if (!fs.existsSync(serviceAccountPath)) {
    throw new ConfigError(
      `Firebase service account not found at ${serviceAccountPath}`,
      'Download a service account key from the Firebase console and set FIREBASE_SERVICE_ACCOUNT_PATH.',
    );
  }
  const bucket = raw.FIREBASE_STORAGE_BUCKET?.trim();
  return {
    openaiApiKey: raw.OPENAI_API_KEY,
    openaiBaseUrl: raw.OPENAI_API_BASE_URL,
    imageModel: raw.OPENAI_IMAGE_MODEL,
    serviceAccountPath,
    storageBucket: bucket ? bucket : null,
    datasetPath: resolvePath(raw.STORIES_JSON_PATH),
    imagesDir: resolvePath(raw.STORY_IMAGES_DIR),
    generationDelayMs: readInt(raw.STORY_IMAGES_GENERATION_DELAY_MS, DEFAULT_GENERATION_DELAY_MS, { max: 60_000 }),
    storyDelayMs: readInt(raw.STORY_IMAGES_STORY_DELAY_MS, DEFAULT_STORY_DELAY_MS, { max: 60_000 }),
    requestTimeoutMs: readInt(raw.STORY_IMAGES_REQUEST_TIMEOUT_MS, 120_000, { min: 1000, max: 600_000 }),
  };
}

export function __resetStoryImagesConfigForTests() {
  envLoaded = false;
}
