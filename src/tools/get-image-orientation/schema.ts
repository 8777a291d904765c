/**
 * Schema definition for get-image-orientation tool
 */

import { z } from 'zod';
import { imageSchema } from '../shared-types';

export const getImageOrientationSchema = z.object({
  image: imageSchema,
});

export type GetImageOrientationParams = z.infer<typeof getImageOrientationSchema>;
