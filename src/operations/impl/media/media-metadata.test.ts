import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';

vi.mock('../../../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
  createRequestLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { createTestRuntime } from '../../../test/test-runtime.js';
import type { MediaMetadata, MetadataProvider } from '../../../providers/interfaces/metadata.provider.js';
import { ExternalToolError } from '../../../utils/errors.js';

function reader(providerId: string, result: MediaMetadata | Error, supports = true) {
  return {
    providerId,
    supports: vi.fn(() => supports),
    extract: vi.fn(async () => {
      if (result instanceof Error) throw result;
      return result;
    }),
    isAvailable: vi.fn(() => true),
  } satisfies MetadataProvider;
}

describe('media.metadata', () => {
  let dir: string;
  let videoPath: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(path.join(tmpdir(), 'media-meta-'));
    videoPath = path.join(dir, 'clip.mp4');
    await writeFile(videoPath, 'not a real video');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function videoMetadata(): MediaMetadata {
    return {
      path: videoPath,
      mimeType: 'video/mp4',
      kind: 'video',
      sizeBytes: 16,
      width: 1920,
      height: 1080,
      durationSeconds: 12.5,
      codec: 'h264',
      make: null,
      model: null,
      createdAt: null,
      tags: { major_brand: 'isom' },
    };
  }

  it('should report the reader that produced the metadata', async () => {
    const exiftool = reader('exiftool', new ExternalToolError('exiftool', 'exited with code 1', 1));
    const ffprobe = reader('ffprobe', videoMetadata());
    const { router } = createTestRuntime({ metadata: [exiftool, ffprobe] });

    const outcome = await router.dispatch({ operation: 'media.metadata', payload: { input_path: videoPath }, context: {} });

    expect(outcome.ok).toBe(true);
    expect(outcome.payload).toEqual({
      path: videoPath,
      mime_type: 'video/mp4',
      kind: 'video',
      size_bytes: 16,
      width: 1920,
      height: 1080,
      duration_seconds: 12.5,
      codec: 'h264',
      make: null,
      model: null,
      created_at: null,
      tags: { major_brand: 'isom' },
      backend: 'ffprobe',
    });
    expect(exiftool.extract).toHaveBeenCalledWith(videoPath);
  });

  it('should skip readers that do not support the file', async () => {
    const exiftool = reader('exiftool', videoMetadata(), false);
    const file = reader('file', { ...videoMetadata(), codec: null });
    const { router } = createTestRuntime({ metadata: [exiftool, file] });

    const outcome = await router.dispatch({ operation: 'media.metadata', payload: { input_path: videoPath }, context: {} });

    expect(outcome.payload).toMatchObject({ backend: 'file', codec: null });
    expect(exiftool.extract).not.toHaveBeenCalled();
  });

  it('should fail with every reader listed when none succeeds', async () => {
    const exiftool = reader('exiftool', new Error('boom'));
    const ffprobe = reader('ffprobe', videoMetadata(), false);
    const { router } = createTestRuntime({ metadata: [exiftool, ffprobe] });

    const outcome = await router.dispatch({ operation: 'media.metadata', payload: { input_path: videoPath }, context: {} });

    expect(outcome.payload).toEqual({
      error: 'ExternalToolFailure',
      message: `metadata: no reader could handle ${videoPath} (exiftool: boom; ffprobe: unsupported file type)`,
      details: { tool: 'metadata', exit_code: null },
    });
  });

  it('should reject a missing file without consulting readers', async () => {
    const exiftool = reader('exiftool', videoMetadata());
    const { router } = createTestRuntime({ metadata: [exiftool] });

    const outcome = await router.dispatch({
      operation: 'media.metadata',
      payload: { input_path: path.join(dir, 'missing.mov') },
      context: {},
    });

    expect(outcome.payload).toMatchObject({ error: 'ValidationError', details: { field: 'input_path' } });
    expect(exiftool.supports).not.toHaveBeenCalled();
  });
});
