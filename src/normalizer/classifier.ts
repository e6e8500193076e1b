import type { Classification } from '../schemas/record.schema.js';

/**
 * Markers checked in order. A later match replaces an earlier one, so
 * RESERVED beats DISPUTED beats REJECT when several co-occur.
 */
const MARKERS: ReadonlyArray<readonly [marker: string, classification: Classification]> = [
  ['** REJECT **', 'REJECT'],
  ['** DISPUTED **', 'DISPUTED'],
  ['** RESERVED **', 'RESERVED'],
];

/**
 * Derive the lifecycle tag of an entry from its combined description.
 */
export function classify(text: string): Classification {
  let classification: Classification = 'VALID';
  for (const [marker, tag] of MARKERS) {
    if (text.includes(marker)) classification = tag;
  }
  return classification;
}
