/**
 * Schema definition for extract-text-info tool
 */

import { z } from 'zod';
import { imageSchema } from '../shared-types';

export const extractTextInfoSchema = z.object({
  image: imageSchema,
});

export type ExtractTextInfoParams = z.infer<typeof extractTextInfoSchema>;
