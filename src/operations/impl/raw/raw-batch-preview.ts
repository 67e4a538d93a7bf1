/**
 * raw.batch_preview
 *
 * Previews for many RAW files into one directory. A file that fails does not
 * fail the batch; it is reported in its own entry.
 */

import path from 'path';
import { z } from 'zod';

import { defineOperation } from '../../types.js';
import { pathField, requireRawFile } from '../../utils/inputs.js';
import { previewOptionsShape, toPreviewOptions } from './raw-preview.js';
import { ensureDir, getOutputPath } from '../../../utils/fs.js';
import { parallelMap, isParallelError } from '../../../utils/parallel.js';
import { toErrorPayload } from '../../../utils/errors.js';
import type { PreviewResult } from '../../../services/preview-pipeline.service.js';

/** Batch size cap per request */
const MAX_BATCH_SIZE = 500;

const inputSchema = z.object({
  input_paths: z.array(pathField('Path to a RAW file')).min(1).max(MAX_BATCH_SIZE),
  output_dir: pathField('Directory that receives <name>.<format> per input'),
  ...previewOptionsShape,
  concurrency: z.number().int().min(1).max(16).default(4).describe('Files decoded at once'),
});

const outputSchema = z.object({
  total: z.number().int(),
  succeeded: z.number().int(),
  failed: z.number().int(),
  results: z.array(
    z.object({
      input_path: z.string(),
      ok: z.boolean(),
      output_path: z.string().optional(),
      source_tier: z.string().optional(),
      width: z.number().int().optional(),
      height: z.number().int().optional(),
      error: z.string().optional(),
      message: z.string().optional(),
    })
  ),
});

type BatchEntry = z.input<typeof outputSchema>['results'][number];

/**
 * One output path per input. Inputs that share a base name (a/IMG.CR2 and
 * b/IMG.CR2) get a numeric suffix so no preview overwrites another.
 * Names are compared case-insensitively.
 */
export function planOutputPaths(inputPaths: string[], outputDir: string, extension: string): string[] {
  const taken = new Set<string>();
  return inputPaths.map((inputPath) => {
    let candidate = getOutputPath(inputPath, outputDir, extension);
    const { name } = path.parse(inputPath);
    for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
      candidate = path.join(outputDir, `${name}-${n}.${extension}`);
    }
    taken.add(candidate.toLowerCase());
    return candidate;
  });
}

export const rawBatchPreviewOperation = defineOperation({
  name: 'raw.batch_preview',
  description: 'Generate previews for a list of RAW files into an output directory',
  tags: ['raw', 'image', 'preview', 'batch'],
  examples: [
    {
      description: 'Two files as WebP',
      input: { input_paths: ['/photos/a.CR2', '/photos/b.NEF'], output_dir: '/previews' },
    },
  ],
  idempotent: true,
  sideEffects: ['writes one preview per input into output_dir'],
  latencyTargetMs: 5000,
  inputSchema,
  outputSchema,

  async execute(input, ctx) {
    const options = toPreviewOptions(input, ctx.services.config);
    await ensureDir(input.output_dir);
    const outputPaths = planOutputPaths(input.input_paths, input.output_dir, options.format);

    const { results, successCount, errorCount } = await parallelMap(
      input.input_paths,
      async (inputPath, index): Promise<PreviewResult> => {
        await requireRawFile(inputPath, `input_paths.${index}`);
        return ctx.services.previews.generate(inputPath, {
          ...options,
          outputPath: outputPaths[index] ?? getOutputPath(inputPath, input.output_dir, options.format),
        });
      },
      { concurrency: input.concurrency }
    );

    const entries: BatchEntry[] = results.map((result, index) => {
      const inputPath = input.input_paths[index] ?? '';
      if (isParallelError(result)) {
        const payload = toErrorPayload(result);
        return { input_path: inputPath, ok: false, error: payload.error, message: payload.message };
      }
      return {
        input_path: inputPath,
        ok: true,
        output_path: result.outputPath ?? undefined,
        source_tier: result.sourceTier.name,
        width: result.width,
        height: result.height,
      };
    });

    ctx.logger.info({ total: entries.length, succeeded: successCount, failed: errorCount }, 'Batch preview finished');

    const cost = results.reduce((sum, r) => sum + (isParallelError(r) ? 0 : r.sourceTier.cost), 0);

    return {
      output: { total: entries.length, succeeded: successCount, failed: errorCount, results: entries },
      cost,
    };
  },
});
