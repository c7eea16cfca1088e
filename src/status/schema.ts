import { z } from 'zod';

/**
 * Schemas for the upstream mirror status document.
 *
 * Field names follow the upstream JSON (snake_case). Optional upstream values
 * arrive as `null`; a missing key is read the same way.
 */

export const MirrorRecordSchema = z.object({
  url: z.string().url(),
  protocol: z.string(),
  last_sync: z.string().nullable().default(null),
  completion_pct: z.number().nullable().default(null),
  delay: z.number().int().nullable().default(null),
  duration_avg: z.number().nullable().default(null),
  duration_stddev: z.number().nullable().default(null),
  score: z.number().nullable().default(null),
  active: z.boolean(),
  country: z.string(),
  country_code: z.string(),
  isos: z.boolean(),
  ipv4: z.boolean(),
  ipv6: z.boolean(),
  details: z.string().default(''),
});

export const MirrorCatalogSchema = z.object({
  cutoff: z.number(),
  last_check: z.string(),
  num_checks: z.number(),
  check_frequency: z.number(),
  urls: z.array(MirrorRecordSchema),
  version: z.number(),
});

export type MirrorRecord = z.infer<typeof MirrorRecordSchema>;
export type MirrorCatalog = z.infer<typeof MirrorCatalogSchema>;
