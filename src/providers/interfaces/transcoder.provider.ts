/**
 * Transcode request: the input is read, args are applied, the output is overwritten
 */
export interface TranscodeRequest {
  inputPath: string;
  outputPath: string;
  /** Arguments placed between the input and the output */
  args: string[];
}

export interface TranscodeResult {
  outputPath: string;
  durationMs: number;
}

/**
 * TranscoderProvider Interface
 *
 * Implementations: FFmpegTranscoderProvider
 */
export interface TranscoderProvider {
  /** Provider identifier for logging/metrics */
  readonly providerId: string;

  transcode(request: TranscodeRequest): Promise<TranscodeResult>;

  isAvailable(): boolean;
}
