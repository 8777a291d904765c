/**
 * Schema definition for analyze-image tool
 */

import { z } from 'zod';
import { imageSchema } from '../shared-types';

export const analyzeImageSchema = z.object({
  image: imageSchema,
});

export type AnalyzeImageParams = z.infer<typeof analyzeImageSchema>;
