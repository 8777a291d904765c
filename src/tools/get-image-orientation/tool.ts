/**
 * Image Orientation Tool
 *
 * Classifies an image as portrait, landscape or square from its dimensions.
 */

import { createTimer } from '../../lib/logger';
import { classifyOrientation, loadImage } from '../../lib/image';
import { Success, Failure, type Result } from '../../domain/types';
import type { OrientationReport } from '../../domain/types';
import type { ToolContext } from '../../mcp/context/types';
import type { WithImageInput } from '../shared-types';
import type { GetImageOrientationParams } from './schema';

async function getImageOrientationImpl(
  params: WithImageInput<GetImageOrientationParams>,
  context: ToolContext,
): Promise<Result<OrientationReport>> {
  const timer = createTimer(context.logger, 'get-image-orientation');

  const loaded = await loadImage(params.image, context.analysis, params.encoding);
  if (!loaded.ok) {
    timer.error(loaded.error.message, { kind: loaded.error.kind });
    return Failure(loaded.error);
  }

  const { width, height } = loaded.value;
  const orientation = classifyOrientation(width, height);

  timer.end({ orientation });
  return Success({ orientation, width, height });
}

export const getImageOrientation = getImageOrientationImpl;
