/**
 * Zod schemas for runtime validation of configuration and persisted artifacts
 */

import { z } from 'zod';
import { coerceNumber } from '../normalizers/utils.js';

/**
 * Tracked person from the roster file
 */
export const TrackedPersonSchema = z.object({
  name: z
    .string()
    .trim()
    .refine((value) => value.split(/\s+/).length === 2, {
      message: 'Name must have exactly two parts (first and last name)',
    }),
  trigram: z.string().min(1, 'Trigram is required'),
  external: z.boolean().default(false),
});

export const RosterSchema = z.object({
  people: z.array(TrackedPersonSchema).default([]),
  projects: z.array(z.string().min(1, 'Project key must not be empty')).default([]),
});

/** Text field; numeric ids are rendered */
const looseText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

/** Numeric field; numeric strings are read, anything else becomes null */
const looseNumber = z.unknown().transform((value) => coerceNumber(value));

/**
 * Persisted work-log record. Best-effort: every field may be missing or null,
 * malformed numbers become null, unknown fields are kept.
 */
export const WorklogRecordSchema = z
  .object({
    userName: looseText,
    userEmail: looseText,
    issueKey: looseText,
    issueId: looseText,
    worklogId: looseText,
    timeSpentSeconds: looseNumber,
    worklogStart: looseText,
    originalEstimateSeconds: looseNumber.optional(),
    remainingEstimateSeconds: looseNumber.optional(),
    issueTimeSpentSeconds: looseNumber.optional(),
  })
  .passthrough();

export const WorklogFileSchema = z.array(WorklogRecordSchema);

export const ChartDocumentSchema = z.object({
  name: z.string().min(1),
  title: z.string(),
  kind: z.enum(['line', 'bar', 'histogram']),
  xLabel: z.string(),
  yLabel: z.string(),
  series: z
    .array(
      z.object({
        name: z.string(),
        points: z.array(z.object({ x: z.union([z.string(), z.number()]), y: z.number().finite() })),
      })
    )
    .min(1, 'A chart needs at least one series'),
});

export type ValidatedRoster = z.infer<typeof RosterSchema>;
export type ValidatedWorklogRecord = z.infer<typeof WorklogRecordSchema>;
export type ValidatedChartDocument = z.infer<typeof ChartDocumentSchema>;

/**
 * Validate the roster file contents
 * @throws ZodError if validation fails
 */
export function validateRoster(data: unknown): ValidatedRoster {
  return RosterSchema.parse(data);
}

/**
 * Validate one persisted work-log file safely (returns result object)
 */
export function safeValidateWorklogFile(
  data: unknown
): z.SafeParseReturnType<unknown, ValidatedWorklogRecord[]> {
  return WorklogFileSchema.safeParse(data);
}

/**
 * Validate a chart document before it is written
 * @throws ZodError if validation fails
 */
export function validateChartDocument(data: unknown): ValidatedChartDocument {
  return ChartDocumentSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
