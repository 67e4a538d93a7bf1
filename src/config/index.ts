import { getEnv, parseEnv, resetEnv, ACCELERATOR_NAMES, LOG_LEVELS, type Env, type LogLevel } from './env.js';

export { getEnv, parseEnv, resetEnv, ACCELERATOR_NAMES, LOG_LEVELS, type Env, type LogLevel };

export type AcceleratorName = (typeof ACCELERATOR_NAMES)[number];

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  service: {
    name: string;
    version: string;
    env: 'development' | 'production' | 'test';
  };
  transport: {
    socketPath: string;
    port?: number;
    host: string;
  };
  backends: {
    accelerators: AcceleratorName[];
    computeSocketPath: string;
    probeTimeoutMs: number;
    nvidiaSmiPath: string;
  };
  tools: {
    dcrawPath: string;
    exiftoolPath: string;
    ffmpegPath: string;
    ffprobePath: string;
    timeoutMs: number;
  };
  worker: {
    concurrency: number;
  };
  preview: {
    quality: number;
    maxDimension: number;
  };
  logging: {
    level: string;
  };
}

/** Version reported by the capability card and the health operation */
export const SERVICE_VERSION = '0.4.0';

/**
 * Settings the command line can override
 */
export interface ConfigOverrides {
  socketPath?: string;
  port?: number;
  accelerators?: AcceleratorName[];
  logLevel?: LogLevel;
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    service: {
      name: env.SERVICE_NAME,
      version: SERVICE_VERSION,
      env: env.NODE_ENV,
    },
    transport: {
      socketPath: env.SOCKET_PATH,
      port: env.PORT,
      host: env.HOST,
    },
    backends: {
      accelerators: env.ACCEL_BACKENDS,
      computeSocketPath: env.COMPUTE_SOCKET_PATH,
      probeTimeoutMs: env.PROBE_TIMEOUT_MS,
      nvidiaSmiPath: env.NVIDIA_SMI_PATH,
    },
    tools: {
      dcrawPath: env.DCRAW_PATH,
      exiftoolPath: env.EXIFTOOL_PATH,
      ffmpegPath: env.FFMPEG_PATH,
      ffprobePath: env.FFPROBE_PATH,
      timeoutMs: env.TOOL_TIMEOUT_MS,
    },
    worker: {
      concurrency: env.WORKER_CONCURRENCY,
    },
    preview: {
      quality: env.PREVIEW_QUALITY,
      maxDimension: env.PREVIEW_MAX_DIMENSION,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };
}

/**
 * Apply command-line overrides on top of an environment-derived config
 */
export function applyOverrides(config: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    ...config,
    transport: {
      ...config.transport,
      socketPath: overrides.socketPath ?? config.transport.socketPath,
      port: overrides.port ?? config.transport.port,
    },
    backends: {
      ...config.backends,
      accelerators: overrides.accelerators ?? config.backends.accelerators,
    },
    logging: {
      level: overrides.logLevel ?? config.logging.level,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}

/**
 * Install CLI overrides before anything reads the config
 */
export function configure(overrides: ConfigOverrides): AppConfig {
  cachedConfig = applyOverrides(getConfig(), overrides);
  return cachedConfig;
}
