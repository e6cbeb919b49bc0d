import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { __resetStoryImagesConfigForTests, loadStoryImagesConfig } from '../../scripts/story-images/config';
import { ConfigError } from '../../scripts/story-images/errors';

const MANAGED_KEYS = [
  'OPENAI_API_KEY',
  'OPENAI_API_BASE_URL',
  'OPENAI_IMAGE_MODEL',
  'FIREBASE_SERVICE_ACCOUNT_PATH',
  'FIREBASE_STORAGE_BUCKET',
  'STORIES_JSON_PATH',
  'STORY_IMAGES_DIR',
  'STORY_IMAGES_GENERATION_DELAY_MS',
  'STORY_IMAGES_STORY_DELAY_MS',
  'STORY_IMAGES_REQUEST_TIMEOUT_MS',
];

function restoreEnv(snapshot: NodeJS.ProcessEnv) {
  for (const key of Object.keys(process.env)) {
    if (!(key in snapshot)) {
      delete process.env[key];
    }
  }
  for (const [key, value] of Object.entries(snapshot)) {
    if (value !== undefined) process.env[key] = value;
  }
}

describe('story images config', () => {
  let envBackup: NodeJS.ProcessEnv;
  let workDir: string;

  beforeEach(async () => {
    envBackup = { ...process.env };
    for (const key of MANAGED_KEYS) delete process.env[key];
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'story-images-config-'));
    const saPath = path.join(workDir, 'sa.json');
    await fs.writeFile(saPath, JSON.stringify({ project_id: 'demo-project' }), 'utf8');
    process.env.OPENAI_API_KEY = 'test-key';
    process.env.FIREBASE_SERVICE_ACCOUNT_PATH = saPath;
    __resetStoryImagesConfigForTests();
  });

  afterEach(async () => {
    restoreEnv(envBackup);
    __resetStoryImagesConfigForTests();
    await fs.rm(workDir, { recursive: true, force: true }).catch(() => {});
  });

  it('fails with remediation text when the api key is missing', () => {
    delete process.env.OPENAI_API_KEY;
    let caught: unknown;
    try {
      loadStoryImagesConfig();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect((caught as ConfigError).message).toBe('OPENAI_API_KEY environment variable not set');
    expect((caught as ConfigError).hint).toContain('https://platform.openai.com/api-keys');
  });

  it('treats a blank api key as missing', () => {
    process.env.OPENAI_API_KEY = '   ';
    expect(() => loadStoryImagesConfig()).toThrow(ConfigError);
  });

  it('applies defaults', () => {
    const cfg = loadStoryImagesConfig();
    expect(cfg).toEqual({
      openaiApiKey: 'test-key',
      openaiBaseUrl: 'https://api.openai.com/v1',
      imageModel: 'dall-e-3',
      serviceAccountPath: path.join(workDir, 'sa.json'),
      storageBucket: null,
      datasetPath: path.resolve(process.cwd(), 'data/stories.json'),
      imagesDir: path.resolve(process.cwd(), 'generated_images'),
      generationDelayMs: 1000,
      storyDelayMs: 500,
      requestTimeoutMs: 120000,
    });
  });

  it('reads overrides and ignores malformed numbers', () => {
    process.env.FIREBASE_STORAGE_BUCKET = ' demo.firebasestorage.app ';
    process.env.STORIES_JSON_PATH = '/data/catalog.json';
    process.env.STORY_IMAGES_STORY_DELAY_MS = '250';
    process.env.STORY_IMAGES_GENERATION_DELAY_MS = 'soon';
    const cfg = loadStoryImagesConfig();
    expect(cfg.storageBucket).toBe('demo.firebasestorage.app');
    expect(cfg.datasetPath).toBe('/data/catalog.json');
    expect(cfg.storyDelayMs).toBe(250);
    expect(cfg.generationDelayMs).toBe(1000);
  });

  it('requires the service account file to exist', () => {
    process.env.FIREBASE_SERVICE_ACCOUNT_PATH = path.join(workDir, 'missing.json');
    expect(() => loadStoryImagesConfig()).toThrow(/service account not found/);
  });

  it('rejects an invalid api base url', () => {
    process.env.OPENAI_API_BASE_URL = 'not a url';
    expect(() => loadStoryImagesConfig()).toThrow(/Invalid story images configuration/);
  });
});
