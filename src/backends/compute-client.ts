/**
 * Compute Client
 *
 * Client for a generic compute service listening on a Unix socket. Every
 * request opens one connection and sends one stimulus `{ op, input }`; the
 * service answers with `{ ok, output, latency_ms }`. Both directions are
 * framed as a 4-byte big-endian length followed by UTF-8 JSON.
 *
 * Operations used here:
 * - `health`: liveness ping, answers `{ backend, device }`
 * - `image_resize`: Lanczos3 resize of interleaved 8-bit pixels
 */

import net from 'net';
import { z } from 'zod';

import type { DecodedImage } from '../types/media.types.js';

const FRAME_HEADER_BYTES = 4;

/** Replies larger than this are refused (256 MiB) */
export const MAX_FRAME_BYTES = 256 * 1024 * 1024;

export interface ComputeClientOptions {
  socketPath: string;
  /** Per-request deadline for connect, write and reply */
  timeoutMs: number;
}

export interface ComputePong {
  backend: string;
  device: string;
}

const replySchema = z.object({
  ok: z.boolean(),
  output: z.unknown(),
  latency_ms: z.number().optional(),
});

const failureSchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});

const pongSchema = z.object({
  backend: z.string().default('unknown'),
  device: z.string().default('unknown'),
});

const imageResultSchema = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    data_base64: z.string().optional(),
    data: z.array(z.number().int().min(0).max(255)).optional(),
    compute_time_ms: z.number().optional(),
  })
  .refine((result) => result.data_base64 !== undefined || result.data !== undefined, {
    message: 'no pixel data in reply',
  });

/**
 * Length-prefixed JSON frame
 */
export function encodeFrame(value: unknown): Buffer {
  const body = Buffer.from(JSON.stringify(value), 'utf8');
  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUInt32BE(body.length, 0);
  return Buffer.concat([header, body]);
}

/**
 * Send one frame and resolve with the body of the first reply frame
 */
function exchange(socketPath: string, request: Buffer, timeoutMs: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let expected: number | null = null;

    const socket = net.createConnection({ path: socketPath });
    socket.setTimeout(timeoutMs);

    const fail = (error: Error): void => {
      socket.destroy();
      reject(error);
    };

    socket.on('connect', () => {
      socket.write(request);
    });

    socket.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
      received += chunk.length;

      if (expected === null && received >= FRAME_HEADER_BYTES) {
        expected = Buffer.concat(chunks, received).readUInt32BE(0);
        if (expected > MAX_FRAME_BYTES) {
          fail(new Error(`reply of ${expected} bytes exceeds the ${MAX_FRAME_BYTES} byte limit`));
          return;
        }
      }

      if (expected !== null && received >= FRAME_HEADER_BYTES + expected) {
        const frame = Buffer.concat(chunks, received);
        socket.destroy();
        resolve(frame.subarray(FRAME_HEADER_BYTES, FRAME_HEADER_BYTES + expected));
      }
    });

    socket.on('timeout', () => fail(new Error(`no reply within ${timeoutMs}ms`)));
    socket.on('error', fail);
    // No-op once the promise has settled
    socket.on('close', () => reject(new Error('connection closed before a full reply')));
  });
}

export class ComputeClient {
  constructor(private readonly options: ComputeClientOptions) {}

  get socketPath(): string {
    return this.options.socketPath;
  }

  /**
   * Send one stimulus; resolves with `output` of a successful reply
   */
  async send(op: string, input: Record<string, unknown>, timeoutMs = this.options.timeoutMs): Promise<unknown> {
    const body = await exchange(this.options.socketPath, encodeFrame({ op, input }), timeoutMs);

    let json: unknown;
    try {
      json = JSON.parse(body.toString('utf8'));
    } catch {
      throw new Error(`${op}: reply is not JSON`);
    }

    const reply = replySchema.safeParse(json);
    if (!reply.success) {
      throw new Error(`${op}: malformed reply`);
    }
    if (!reply.data.ok) {
      const failure = failureSchema.safeParse(reply.data.output);
      const reason = failure.success ? (failure.data.message ?? failure.data.error) : undefined;
      throw new Error(`${op}: ${reason ?? 'unknown error'}`);
    }
    return reply.data.output;
  }

  async ping(timeoutMs?: number): Promise<ComputePong> {
    const parsed = pongSchema.safeParse(await this.send('health', {}, timeoutMs));
    if (!parsed.success) {
      throw new Error('health: unexpected reply');
    }
    return parsed.data;
  }

  /**
   * Resize on the compute service. The reply must carry exactly the requested
   * dimensions and a full raster.
   */
  async resize(image: DecodedImage, width: number, height: number): Promise<DecodedImage> {
    const output = await this.send('image_resize', {
      data_base64: image.data.toString('base64'),
      src_width: image.width,
      src_height: image.height,
      channels: image.channels,
      dst_width: width,
      dst_height: height,
      algorithm: 'Lanczos3',
    });

    const parsed = imageResultSchema.safeParse(output);
    if (!parsed.success) {
      throw new Error(`image_resize: ${parsed.error.issues[0]?.message ?? 'unexpected reply'}`);
    }

    const result = parsed.data;
    if (result.width !== width || result.height !== height) {
      throw new Error(`image_resize: got ${result.width}x${result.height}, asked for ${width}x${height}`);
    }

    const data =
      result.data_base64 !== undefined ? Buffer.from(result.data_base64, 'base64') : Buffer.from(result.data ?? []);
    const expectedBytes = width * height * image.channels;
    if (data.length !== expectedBytes) {
      throw new Error(`image_resize: got ${data.length} bytes, expected ${expectedBytes}`);
    }

    return { data, width, height, channels: image.channels };
  }
}
