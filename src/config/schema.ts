/**
 * Zod schema for `converter.config.yaml`.
 *
 * Every section is optional in the file; defaults fill the gaps so that a
 * run without any config file still works.
 */

import { z } from 'zod';

export const SourceEntrySchema = z.object({
  /** File name inside the sources directory. */
  file: z.string().min(1),
  displayName: z.string().min(1),
  kind: z.enum(['pdf', 'md']),
  /** BeastVault source tag; a slug of the display name when omitted. */
  tag: z.string().min(1).optional(),
});

export const ConverterConfigSchema = z.object({
  sourcesDir: z.string().default('sources'),
  sources: z.array(SourceEntrySchema).default([]),
  /** Origin file name to preferred source display name. */
  canonicalSources: z.record(z.string(), z.string()).default({}),
  skip: z
    .object({
      files: z.array(z.string()).default([]),
      dirs: z.array(z.string()).default([]),
    })
    .default({}),
  /** Lines dropped from PDF text when they appear on their own. */
  runningHeaders: z.array(z.string()).default(['ADVERSARY', 'ADVERSARIES', 'DAGGERHEART', 'SRD']),
  /** Adversary type to index category. */
  categories: z.record(z.string(), z.string()).default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type SourceEntry = z.infer<typeof SourceEntrySchema>;
export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
