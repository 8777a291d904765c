/**
 * Schema definition for count-colors tool
 */

import { z } from 'zod';
import { imageSchema } from '../shared-types';
import { CONSTANTS } from '../../config/app-config';

export const countColorsSchema = z.object({
  image: imageSchema,
  sampleLimit: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Maximum number of pixels to scan; larger images are sampled uniformly'),
  top: z
    .number()
    .int()
    .min(1)
    .max(CONSTANTS.LIMITS.MAX_TOP_COLORS)
    .optional()
    .describe('Number of dominant colors to report'),
});

export type CountColorsParams = z.infer<typeof countColorsSchema>;
