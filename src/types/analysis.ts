/**
 * Postwatch — Analysis Types
 */

import { z } from 'zod';

export const AnalysisCategorySchema = z.enum([
  'finance',
  'crypto',
  'technology',
  'ai',
  'health',
  'politics',
  'personal',
  'other',
]);
export type AnalysisCategory = z.infer<typeof AnalysisCategorySchema>;

export const AnalysisResultSchema = z.object({
  translation: z.string(),
  summary: z.string().min(1),
  tags: z.array(z.string()).default([]),
  category: AnalysisCategorySchema.catch('other'),
  hints: z.array(z.string()).default([]),
});
export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;
