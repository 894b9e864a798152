/**
 * Per-operation option schemas. Unknown keys are rejected.
 */

import { z } from 'zod';
import { ChangelogTracker } from './changelog.js';
import { JsonValueSchema } from './document.js';
import { InvalidOptionsError } from './errors.js';
import { MERGE_STRATEGIES } from './structure.js';

const tracker = z.instanceof(ChangelogTracker).optional();

export const ImportOptionsSchema = z
  .object({
    /** Replace entries that already exist */
    overwrite: z.boolean().default(false),
    /** Turn structure preservation on/off; left as stored when absent */
    preserveStructure: z.boolean().optional(),
    strategy: z.enum(MERGE_STRATEGIES).default('preserve'),
    /** Deflate binary payloads before base64 */
    compress: z.boolean().default(false),
    /** false: the first failure aborts the batch and nothing is written */
    continueOnError: z.boolean().default(true),
    maxFileSize: z.number().int().positive().optional(),
    maxTotalSize: z.number().int().positive().optional(),
    /** Stops dispatching further files once aborted */
    signal: z.instanceof(AbortSignal).optional(),
    tracker,
  })
  .strict();

export type ImportOptions = z.input<typeof ImportOptionsSchema>;

export const ExportSelectorSchema = z
  .object({
    /** Exact logical paths */
    names: z.array(z.string()).optional(),
    /** Glob over logical paths (`*`, `**`, `?`) */
    pattern: z.string().min(1).optional(),
    /** `image/png` or `image/*` */
    mediaType: z.string().min(1).optional(),
  })
  .strict();

export type ExportSelector = z.input<typeof ExportSelectorSchema>;

export const ExportOptionsSchema = z
  .object({
    /** Remove each entry once the sink has stored it */
    removeFromContainer: z.boolean().default(false),
    /** Throw on the first failure instead of reporting it */
    strict: z.boolean().default(false),
    tracker,
  })
  .strict();

export type ExportOptions = z.input<typeof ExportOptionsSchema>;

export const ListFilterSchema = z
  .object({
    mediaType: z.string().min(1).optional(),
    pattern: z.string().min(1).optional(),
  })
  .strict();

export type ListFilter = z.input<typeof ListFilterSchema>;

/** Metadata values must be JSON. */
export const MetadataPatchSchema = z.record(JsonValueSchema);

export const TrackedOptionsSchema = z.object({ tracker }).strict();

export type TrackedOptions = z.input<typeof TrackedOptionsSchema>;

/**
 * Validate options, applying defaults.
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, value: unknown, subject: string): z.output<S> {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    throw new InvalidOptionsError(
      subject,
      result.error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)),
    );
  }
  return result.data;
}
