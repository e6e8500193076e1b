import { z } from 'zod';

/**
 * Schemas for the NVD JSON 1.1 yearly feed (`nvdcve-1.1-<year>.json`).
 *
 * Only the fields the normalizer reads are declared. Objects are
 * passthrough so unknown keys survive in the raw payload.
 */

export const DescriptionEntry = z
  .object({
    lang: z.string().optional(),
    value: z.string(),
  })
  .passthrough();

export type DescriptionEntry = z.infer<typeof DescriptionEntry>;

export const CveItem = z
  .object({
    cve: z
      .object({
        CVE_data_meta: z.object({ ID: z.string().min(1) }).passthrough(),
        description: z
          .object({
            description_data: z.array(DescriptionEntry).optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough(),
    /** Checked separately: a bad metrics block must not reject the entry. */
    impact: z.unknown().optional(),
    publishedDate: z.string(),
    lastModifiedDate: z.string(),
  })
  .passthrough();

export type CveItem = z.infer<typeof CveItem>;

/**
 * Feed envelope. Items stay `unknown` here: each one is validated by the
 * normalizer so a bad entry does not reject the whole file.
 */
export const FeedFile = z
  .object({
    CVE_data_type: z.string().optional(),
    CVE_data_numberOfCVEs: z.string().optional(),
    CVE_Items: z.array(z.unknown()),
  })
  .passthrough();

export type FeedFile = z.infer<typeof FeedFile>;

// ---------------------------------------------------------------------------
// Metric sources (parsed independently of each other)
// ---------------------------------------------------------------------------

export const ImpactBlock = z
  .object({
    baseMetricV2: z.unknown().optional(),
    baseMetricV3: z.unknown().optional(),
  })
  .passthrough();

const SeverityLabel = z
  .string()
  .transform((s) => s.trim().toUpperCase())
  .pipe(z.enum(['LOW', 'MEDIUM', 'HIGH', 'CRITICAL']));

const BaseScore = z.number().min(0).max(10);

/** `impact.baseMetricV2`: severity sits beside the cvssV2 block. */
export const BaseMetricV2Severity = z.object({ severity: SeverityLabel }).passthrough();
export const BaseMetricV2Score = z
  .object({ cvssV2: z.object({ baseScore: BaseScore }).passthrough() })
  .passthrough();

/** `impact.baseMetricV3`: severity sits inside the cvssV3 block. */
export const BaseMetricV3Severity = z
  .object({ cvssV3: z.object({ baseSeverity: SeverityLabel }).passthrough() })
  .passthrough();
export const BaseMetricV3Score = z
  .object({ cvssV3: z.object({ baseScore: BaseScore }).passthrough() })
  .passthrough();
