/**
 * One-shot analysis of a local image file, used by the `analyze` command
 */

import { readFile } from 'fs/promises';
import type { Deps } from '../app/container';
import type { ErrorReport, Result } from '../domain/types';
import type { ToolContext } from '../mcp/context/types';
import type { ImageInput } from '../tools/shared-types';
import { analyzeImage } from '../tools/analyze-image';
import { getImageOrientation } from '../tools/get-image-orientation';
import { countColors } from '../tools/count-colors';
import { extractTextInfo } from '../tools/extract-text-info';

type AnalysisKey = 'analysis' | 'orientation' | 'colors' | 'text';

type ImageAnalysis = (params: ImageInput, context: ToolContext) => Promise<Result<unknown>>;

const ANALYSES: ReadonlyArray<readonly [AnalysisKey, string, ImageAnalysis]> = [
  ['analysis', 'analyze_image', analyzeImage],
  ['orientation', 'get_image_orientation', getImageOrientation],
  ['colors', 'count_colors', countColors],
  ['text', 'extract_text_info', extractTextInfo],
];

export type FileAnalysisReport = {
  file: string;
} & Record<AnalysisKey, unknown>;

export interface FileAnalysisOutcome {
  report: FileAnalysisReport;
  failed: boolean;
}

/**
 * Run every image tool over the same bytes and collect the results.
 * A failing tool contributes `{ error }` in place of its report.
 */
export async function analyzeImageBytes(
  file: string,
  bytes: Uint8Array,
  deps: Deps,
): Promise<FileAnalysisOutcome> {
  const results: Partial<Record<AnalysisKey, unknown>> = {};
  const errors: ErrorReport[] = [];

  for (const [key, toolName, run] of ANALYSES) {
    const result = await run(
      { image: bytes, encoding: 'binary' },
      { logger: deps.logger.child({ tool: toolName }), analysis: deps.config.analysis },
    );
    if (result.ok) {
      results[key] = result.value;
    } else {
      results[key] = { error: result.error };
      errors.push(result.error);
    }
  }

  return {
    report: {
      file,
      analysis: results.analysis,
      orientation: results.orientation,
      colors: results.colors,
      text: results.text,
    },
    failed: errors.length > 0,
  };
}

export async function analyzeFile(file: string, deps: Deps): Promise<FileAnalysisOutcome> {
  const bytes = await readFile(file);
  return analyzeImageBytes(file, bytes, deps);
}
