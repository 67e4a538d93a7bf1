import { z } from 'zod';

/** Acceleration backends that can be switched on or off (the CPU reference is always present) */
export const ACCELERATOR_NAMES = ['cuda', 'metal', 'compute'] as const;

const acceleratorSchema = z.enum(ACCELERATOR_NAMES);

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Parse a comma-separated accelerator list.
 * 'none' (or an empty string) disables every accelerator.
 */
export const acceleratorListSchema = z
  .string()
  .transform((val, ctx) => {
    const names = val.split(',').map((n) => n.trim().toLowerCase()).filter(Boolean);
    if (names.length === 1 && names[0] === 'none') {
      return [];
    }
    const parsed: Array<z.infer<typeof acceleratorSchema>> = [];
    for (const name of names) {
      const result = acceleratorSchema.safeParse(name);
      if (!result.success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown accelerator '${name}'. Expected one of: ${ACCELERATOR_NAMES.join(', ')}, none`,
        });
        return z.NEVER;
      }
      if (!parsed.includes(result.data)) {
        parsed.push(result.data);
      }
    }
    return parsed;
  });

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  // Service
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  SERVICE_NAME: z.string().default('media-preprocessor'),

  // Transport
  SOCKET_PATH: z.string().default('/tmp/media-preprocessor.sock'),
  PORT: z.coerce.number().int().positive().optional(), // TCP instead of the socket when set
  HOST: z.string().default('127.0.0.1'),

  // Backend cascade
  ACCEL_BACKENDS: acceleratorListSchema.default('cuda,metal,compute'),
  COMPUTE_SOCKET_PATH: z.string().default('/tmp/compute.sock'),
  PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  NVIDIA_SMI_PATH: z.string().default('nvidia-smi'),

  // External tools
  DCRAW_PATH: z.string().default('dcraw'),
  EXIFTOOL_PATH: z.string().default('exiftool'),
  FFMPEG_PATH: z.string().default('ffmpeg'),
  FFPROBE_PATH: z.string().default('ffprobe'),
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(120000), // 2 minutes

  // Worker pool
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(4),

  // RAW preview defaults
  PREVIEW_QUALITY: z.coerce.number().int().min(1).max(100).default(92),
  PREVIEW_MAX_DIMENSION: z.coerce.number().int().positive().default(2048),

  // Logging
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    // Use stderr for pre-logger initialization errors
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (parses on first use)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}

/**
 * Drop the cached environment so the next read parses again
 */
export function resetEnv(): void {
  cachedEnv = null;
}
