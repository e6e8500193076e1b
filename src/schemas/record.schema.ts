import { z } from 'zod';

export const Classification = z.enum(['VALID', 'REJECT', 'DISPUTED', 'RESERVED']);

export type Classification = z.infer<typeof Classification>;

export const Severity = z.enum(['LOW', 'MEDIUM', 'HIGH', 'CRITICAL']);

export type Severity = z.infer<typeof Severity>;

export const Impact = z.enum(['NONE', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL']);

export type Impact = z.infer<typeof Impact>;

/** Which severity column a distribution report counts. */
export const SeveritySystem = z.enum(['V2', 'V3', 'COMBINED']);

export type SeveritySystem = z.infer<typeof SeveritySystem>;

export const TieBreak = z.enum(['V2', 'V3']);

export type TieBreak = z.infer<typeof TieBreak>;

/**
 * One normalized vulnerability entry, produced during an import run.
 */
export interface VulnerabilityRecord {
  /** e.g. "CVE-2021-44228" */
  id: string;
  /** Feed string, `YYYY-MM-DDThh:mmZ` */
  publishedDate: string;
  publishedAt: Date;
  lastModifiedDate: string;
  lastModifiedAt: Date;
  descriptions: string[];
  /** Descriptions joined with "|", or "No description info" */
  combinedDescription: string;
  classification: Classification;
  cvssV2Score?: number;
  cvssV2Severity?: Severity;
  cvssV3Score?: number;
  cvssV3Severity?: Severity;
  impact: Impact;
  /** The raw feed entry, unmodified */
  rawPayload: unknown;
}
