import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { beforeEach, describe, expect, it, vi } from 'vitest';

const firebase = vi.hoisted(() => {
  const bucket = { upload: vi.fn() };
  return {
    bucket,
    bucketFn: vi.fn(() => bucket),
    initializeApp: vi.fn((options: unknown, name: string) => ({ name, options })),
    getApps: vi.fn((): Array<{ name: string }> => []),
    cert: vi.fn((serviceAccountPath: string) => ({ serviceAccountPath })),
  };
});

vi.mock('firebase-admin/app', () => ({
  cert: firebase.cert,
  getApps: firebase.getApps,
  initializeApp: firebase.initializeApp,
}));

vi.mock('firebase-admin/storage', () => ({
  getStorage: vi.fn(() => ({ bucket: firebase.bucketFn })),
}));

import { StorageUploadError, createFirebaseImageStorage, resolveBucketName } from '@/server/storage';

describe('firebase image storage', () => {
  beforeEach(() => {
    firebase.bucket.upload.mockReset();
    firebase.bucketFn.mockClear();
    firebase.initializeApp.mockClear();
    firebase.getApps.mockReturnValue([]);
  });

  it('derives the default bucket from the service account project', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'story-images-sa-'));
    try {
      const saPath = path.join(dir, 'serviceAccountKey.json');
      await fs.writeFile(saPath, JSON.stringify({ project_id: 'demo-project' }), 'utf8');
      expect(resolveBucketName({ serviceAccountPath: saPath })).toBe('demo-project.firebasestorage.app');
      expect(resolveBucketName({ serviceAccountPath: saPath, bucket: ' custom-bucket ' })).toBe('custom-bucket');
    } finally {
      await fs.rm(dir, { recursive: true, force: true }).catch(() => {});
    }
  });

  it('uploads, publishes and returns the public url', async () => {
    const file = {
      makePublic: vi.fn(async () => [{}]),
      publicUrl: vi.fn(() => 'https://storage.googleapis.com/demo.firebasestorage.app/story_covers/a.png'),
    };
    firebase.bucket.upload.mockResolvedValue([file, {}]);

    const storage = createFirebaseImageStorage({ serviceAccountPath: '/keys/sa.json', bucket: 'demo.firebasestorage.app' });
    const url = await storage.upload('/tmp/a.png', 'story_covers/a.png');

    expect(url).toBe('https://storage.googleapis.com/demo.firebasestorage.app/story_covers/a.png');
    expect(firebase.cert).toHaveBeenCalledWith('/keys/sa.json');
    expect(firebase.initializeApp).toHaveBeenCalledWith(
      { credential: { serviceAccountPath: '/keys/sa.json' }, storageBucket: 'demo.firebasestorage.app' },
      'story-images',
    );
    expect(firebase.bucketFn).toHaveBeenCalledWith('demo.firebasestorage.app');
    expect(firebase.bucket.upload).toHaveBeenCalledWith('/tmp/a.png', {
      destination: 'story_covers/a.png',
      contentType: 'image/png',
    });
    expect(file.makePublic).toHaveBeenCalledTimes(1);
  });

  it('reuses an already initialized app', async () => {
    firebase.getApps.mockReturnValue([{ name: 'story-images' }]);

    createFirebaseImageStorage({ serviceAccountPath: '/keys/sa.json', bucket: 'demo-bucket' });

    expect(firebase.initializeApp).not.toHaveBeenCalled();
  });

  it('wraps upload failures', async () => {
    firebase.bucket.upload.mockRejectedValue(new Error('permission denied'));
    const storage = createFirebaseImageStorage({ serviceAccountPath: '/keys/sa.json', bucket: 'demo-bucket' });

    const promise = storage.upload('/tmp/a.png', 'story_covers/a.png');

    await expect(promise).rejects.toBeInstanceOf(StorageUploadError);
    await expect(promise).rejects.toMatchObject({
      remotePath: 'story_covers/a.png',
      message: 'Upload of /tmp/a.png to story_covers/a.png failed: permission denied',
    });
  });
});
