import type { RawDecoderProvider } from '../interfaces/raw-decoder.provider.js';
import type { ImageCodecProvider } from '../interfaces/image-codec.provider.js';
import type { DecodedImage, RawMetadata } from '../../types/media.types.js';
import { RawDecodeError, getErrorMessage } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { runCommand, tailDiagnostic, type CommandResult } from '../utils/spawn.js';

const logger = createChildLogger({ service: 'dcraw' });

/** dcraw messages that mean the file itself is unreadable */
const CORRUPT_PATTERNS = [/cannot decode file/i, /corrupt data/i, /unexpected end of file/i];

/** dcraw messages that mean the file simply has no embedded preview */
const NO_THUMBNAIL_PATTERN = /has no thumbnail/i;

export interface DcrawOptions {
  dcrawPath: string;
  timeoutMs: number;
}

/**
 * Parse the output of `dcraw -i -v`
 */
export function parseIdentifyOutput(output: string): RawMetadata {
  const fields = new Map<string, string>();
  for (const line of output.split('\n')) {
    const idx = line.indexOf(':');
    if (idx <= 0) continue;
    const key = line.slice(0, idx).trim();
    const value = line.slice(idx + 1).trim();
    if (key && value) {
      fields.set(key, value);
    }
  }

  const take = (key: string): string | null => {
    const value = fields.get(key) ?? null;
    fields.delete(key);
    return value;
  };

  const camera = take('Camera');
  const [make, ...modelParts] = camera ? camera.split(/\s+/) : [];
  const iso = take('ISO speed');
  const shutter = take('Shutter');
  const aperture = take('Aperture');
  const focal = take('Focal length');
  const size = take('Image size');
  const timestamp = take('Timestamp');
  fields.delete('Filename');

  const sizeMatch = size?.match(/(\d+)\s*x\s*(\d+)/);
  const parsedDate = timestamp ? new Date(timestamp) : null;

  return {
    make: make ?? null,
    model: modelParts.length > 0 ? modelParts.join(' ') : null,
    lens: take('Lens'),
    iso: iso ? parseNumber(iso) : null,
    aperture: aperture ? parseNumber(aperture.replace(/^f\//i, '')) : null,
    shutterSpeed: shutter ? formatShutter(shutter) : null,
    focalLength: focal ? parseNumber(focal) : null,
    width: sizeMatch ? Number(sizeMatch[1]) : null,
    height: sizeMatch ? Number(sizeMatch[2]) : null,
    timestamp: parsedDate && !Number.isNaN(parsedDate.getTime()) ? parsedDate.toISOString() : timestamp,
    // identify does not print either
    gps: null,
    whiteBalance: null,
    extra: Object.fromEntries(fields),
  };
}

function parseNumber(value: string): number | null {
  const n = parseFloat(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * "1/250.0 sec" -> "1/250", "0.5 sec" -> "0.5"
 */
function formatShutter(value: string): string {
  const stripped = value.replace(/\s*sec$/i, '');
  const fraction = stripped.match(/^1\/(\d+(?:\.\d+)?)$/);
  if (fraction) {
    return `1/${Number(fraction[1])}`;
  }
  const n = parseNumber(stripped);
  return n === null ? stripped : String(n);
}

/**
 * Dcraw RAW Decoder Provider
 *
 * Shells out to dcraw and decodes its output (embedded JPEG/PPM thumbnail,
 * or 8-bit TIFF) through the image codec.
 */
export class DcrawRawDecoderProvider implements RawDecoderProvider {
  readonly providerId = 'dcraw';

  constructor(
    private readonly codec: ImageCodecProvider,
    private readonly options: DcrawOptions
  ) {}

  async tryEmbeddedPreview(path: string): Promise<DecodedImage | null> {
    const result = await this.run(['-e', '-c', path]);

    if (result.exitCode !== 0) {
      if (NO_THUMBNAIL_PATTERN.test(result.stderr)) {
        return null;
      }
      throw this.failure('embedded preview extraction', result);
    }
    if (result.stdout.length === 0) {
      return null;
    }

    return this.decodeOutput(result.stdout, 'embedded preview');
  }

  async decodeReduced(path: string): Promise<DecodedImage> {
    const result = await this.run(['-h', '-w', '-T', '-c', path]);
    if (result.exitCode !== 0 || result.stdout.length === 0) {
      throw this.failure('half-size decode', result);
    }
    return this.decodeOutput(result.stdout, 'half-size decode');
  }

  async decodeFull(path: string): Promise<DecodedImage> {
    const result = await this.run(['-w', '-T', '-c', path]);
    if (result.exitCode !== 0 || result.stdout.length === 0) {
      throw this.failure('full decode', result);
    }
    return this.decodeOutput(result.stdout, 'full decode');
  }

  async readMetadata(path: string): Promise<RawMetadata> {
    const result = await this.run(['-i', '-v', path]);
    if (result.exitCode !== 0) {
      throw this.failure('identify', result);
    }
    return parseIdentifyOutput(result.stdout.toString());
  }

  isAvailable(): boolean {
    return this.options.dcrawPath.length > 0;
  }

  private run(args: string[]): Promise<CommandResult> {
    logger.debug({ args }, 'Running dcraw');
    return runCommand(this.options.dcrawPath, args, { tool: 'dcraw', timeoutMs: this.options.timeoutMs });
  }

  private failure(step: string, result: CommandResult): RawDecodeError {
    const corruptSource = CORRUPT_PATTERNS.some((pattern) => pattern.test(result.stderr));
    const reason = result.exitCode !== 0 ? `exited with code ${result.exitCode}` : 'produced no output';
    return new RawDecodeError('dcraw', `${step} ${reason}`, {
      exitCode: result.exitCode,
      diagnostic: tailDiagnostic(result.stderr),
      corruptSource,
    });
  }

  private async decodeOutput(bytes: Buffer, step: string): Promise<DecodedImage> {
    try {
      return await this.codec.decode(bytes);
    } catch (error) {
      throw new RawDecodeError('dcraw', `${step} output could not be decoded: ${getErrorMessage(error)}`, {
        corruptSource: true,
      });
    }
  }
}
