import { z } from 'zod';
import type { ExtraValue } from './types/index.js';

const extraValueSchema: z.ZodType<ExtraValue> = z.lazy(() =>
  z.union([z.string(), z.number().finite(), z.boolean(), z.record(extraValueSchema)])
);

const optionalText = z
  .string()
  .nullish()
  .transform(value => value ?? undefined);

export const threatSchema = z.object({
  threat_id: z.string().refine(value => value.trim().length > 0, 'threat_id is required'),
  file_path: optionalText,
  sha256: optionalText,
  description: optionalText,
  additional_info: z
    .record(extraValueSchema)
    .nullish()
    .transform(value => value ?? undefined)
});

export const recommendRequestSchema = z.object({
  threat: threatSchema,
  confirm: z.boolean().default(false)
});

// Per-item confirmation hints are stripped: batch mode never confirms.
export const batchRequestSchema = z.object({
  threats: z.array(threatSchema)
});

export type RecommendRequest = z.infer<typeof recommendRequestSchema>;
export type BatchRequest = z.infer<typeof batchRequestSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
