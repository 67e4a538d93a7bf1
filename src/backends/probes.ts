/**
 * Backend Probes
 *
 * One probe per execution backend. A probe resolves with a short info string
 * when the backend can be used, and rejects with BackendInitializationError
 * when it cannot.
 */

import sharp from 'sharp';

import type { Backend } from '../types/media.types.js';
import { BackendInitializationError, getErrorMessage } from '../utils/errors.js';
import { isSocket } from '../utils/fs.js';
import { runCommand, type CommandResult } from '../providers/utils/spawn.js';
import type { ComputeClient } from './compute-client.js';

export interface BackendProbe {
  readonly backend: Backend;
  probe(): Promise<string>;
}

export type BackendProbes = Record<Backend, BackendProbe>;

export interface ProbeSettings {
  nvidiaSmiPath: string;
  compute: ComputeClient;
  probeTimeoutMs: number;
  platform?: NodeJS.Platform;
  arch?: string;
}

/**
 * Reject with BackendInitializationError if the promise does not settle in time
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, backend: Backend): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new BackendInitializationError(backend, `probe timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * NVIDIA GPU: nvidia-smi must exit 0 and list at least one device
 */
export function createCudaProbe(nvidiaSmiPath: string, timeoutMs: number): BackendProbe {
  return {
    backend: 'cuda',
    async probe() {
      let result: CommandResult;
      try {
        result = await runCommand(nvidiaSmiPath, ['-L'], { tool: 'nvidia-smi', timeoutMs });
      } catch (error) {
        throw new BackendInitializationError('cuda', getErrorMessage(error));
      }

      if (result.exitCode !== 0) {
        throw new BackendInitializationError('cuda', `nvidia-smi exited with code ${result.exitCode}`);
      }

      const gpu = result.stdout
        .toString()
        .split('\n')
        .map((line) => line.trim())
        .find((line) => line.startsWith('GPU '));
      if (!gpu) {
        throw new BackendInitializationError('cuda', 'no GPU listed by nvidia-smi');
      }
      return gpu;
    },
  };
}

/**
 * Apple Silicon GPU
 */
export function createMetalProbe(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch
): BackendProbe {
  return {
    backend: 'metal',
    async probe() {
      if (platform !== 'darwin' || arch !== 'arm64') {
        throw new BackendInitializationError('metal', `not available on ${platform}/${arch}`);
      }
      return `Apple Silicon (${arch})`;
    },
  };
}

/**
 * Generic compute service: the socket must exist and answer a health ping
 */
export function createComputeProbe(client: ComputeClient, timeoutMs: number): BackendProbe {
  return {
    backend: 'compute',
    async probe() {
      const { socketPath } = client;
      if (!(await isSocket(socketPath))) {
        throw new BackendInitializationError('compute', `no compute socket at ${socketPath}`);
      }

      try {
        const pong = await client.ping(timeoutMs);
        return `${pong.device} (${pong.backend}) at ${socketPath}`;
      } catch (error) {
        throw new BackendInitializationError('compute', `ping failed: ${getErrorMessage(error)}`);
      }
    },
  };
}

/**
 * Reference backend: libvips through sharp, always present
 */
export function createCpuProbe(): BackendProbe {
  return {
    backend: 'cpu',
    async probe() {
      return `libvips ${sharp.versions.vips}`;
    },
  };
}

export function createDefaultProbes(settings: ProbeSettings): BackendProbes {
  return {
    cuda: createCudaProbe(settings.nvidiaSmiPath, settings.probeTimeoutMs),
    metal: createMetalProbe(settings.platform, settings.arch),
    compute: createComputeProbe(settings.compute, settings.probeTimeoutMs),
    cpu: createCpuProbe(),
  };
}
