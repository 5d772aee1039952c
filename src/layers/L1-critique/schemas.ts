/**
 * Zod schemas for the model's critique output.
 */
import { z } from 'zod';

export const FindingSchema = z.object({
  severity: z.enum(['error', 'warning']),
  message: z.string(),
});

export const CritiqueOutputSchema = z.object({
  function: z.string().nullable().optional(),
  findings: z.array(FindingSchema),
  suggested_docstring: z.string().nullable().optional(),
});

/**
 * Flat shape with one error and one warning string; an empty string means none.
 */
export const LegacyCritiqueOutputSchema = z.object({
  function: z.string().nullable().optional(),
  error: z.string(),
  warning: z.string(),
  solution: z.string().nullable().optional(),
});
