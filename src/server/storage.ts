import { readFileSync } from 'node:fs';
import { cert, getApps, initializeApp, type App } from 'firebase-admin/app';
import { getStorage } from 'firebase-admin/storage';
import type { StoryImageStorage } from '@/shared/types/stories';

export class StorageUploadError extends Error {
  readonly remotePath: string;

  constructor(message: string, options: { remotePath: string; cause?: unknown }) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'StorageUploadError';
    this.remotePath = options.remotePath;
  }
}

export type FirebaseStorageOptions = {
  serviceAccountPath: string;
  bucket?: string | null;
  contentType?: string;
};

const APP_NAME = 'story-images';

function readProjectId(serviceAccountPath: string): string | null {
  const raw: unknown = JSON.parse(readFileSync(serviceAccountPath, 'utf8'));
  if (raw && typeof raw === 'object' && 'project_id' in raw && typeof raw.project_id === 'string') {
    return raw.project_id;
  }
  return null;
}

export function resolveBucketName(options: FirebaseStorageOptions) {
  const explicit = options.bucket?.trim();
  if (explicit) return explicit;
  const projectId = readProjectId(options.serviceAccountPath);
  if (!projectId) {
    throw new Error(`Service account at ${options.serviceAccountPath} has no project_id; set FIREBASE_STORAGE_BUCKET.`);
  }
  return `${projectId}.firebasestorage.app`;
}

function ensureApp(options: FirebaseStorageOptions, bucketName: string): App {
  const existing = getApps().find((app) => app.name === APP_NAME);
  if (existing) return existing;
  return initializeApp(
    {
      credential: cert(options.serviceAccountPath),
      storageBucket: bucketName,
    },
    APP_NAME,
  );
}

export function createFirebaseImageStorage(options: FirebaseStorageOptions): StoryImageStorage {
  const bucketName = resolveBucketName(options);
  const bucket = getStorage(ensureApp(options, bucketName)).bucket(bucketName);
  const contentType = options.contentType ?? 'image/png';

  return {
    async upload(localPath: string, remotePath: string) {
      try {
        const [file] = await bucket.upload(localPath, { destination: remotePath, contentType });
        await file.makePublic();
        return file.publicUrl();
      } catch (err) {
        throw new StorageUploadError(
          `Upload of ${localPath} to ${remotePath} failed: ${err instanceof Error ? err.message : String(err)}`,
          { remotePath, cause: err },
        );
      }
    },
  };
}
