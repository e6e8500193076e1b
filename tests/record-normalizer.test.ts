/**
 * Unit tests for the Record Normalizer.
 */

import { describe, it, expect } from 'vitest';
import {
  NO_DESCRIPTION,
  normalize,
  normalizeAll,
  parseFeedTimestamp,
} from '../src/normalizer/record-normalizer.js';
import { MalformedRecordError } from '../src/errors.js';
import { makeEntry } from './helpers/feed-entries.js';

describe('Record Normalizer', () => {
  describe('normalize', () => {
    it('should map every field of a well-formed entry', () => {
      const raw = makeEntry({
        id: 'CVE-2021-44228',
        publishedDate: '2021-12-10T10:15Z',
        lastModifiedDate: '2022-02-01T17:30Z',
        descriptions: ['Remote code execution via JNDI lookups.', 'Second paragraph.'],
        v2: { severity: 'HIGH', score: 9.3 },
        v3: { severity: 'CRITICAL', score: 10.0 },
      });

      const record = normalize(raw);

      expect(record.id).toBe('CVE-2021-44228');
      expect(record.publishedDate).toBe('2021-12-10T10:15Z');
      expect(record.publishedAt.toISOString()).toBe('2021-12-10T10:15:00.000Z');
      expect(record.lastModifiedAt.toISOString()).toBe('2022-02-01T17:30:00.000Z');
      expect(record.descriptions).toEqual([
        'Remote code execution via JNDI lookups.',
        'Second paragraph.',
      ]);
      expect(record.combinedDescription).toBe(
        'Remote code execution via JNDI lookups.|Second paragraph.',
      );
      expect(record.classification).toBe('VALID');
      expect(record.cvssV2Score).toBe(9.3);
      expect(record.cvssV2Severity).toBe('HIGH');
      expect(record.cvssV3Score).toBe(10.0);
      expect(record.cvssV3Severity).toBe('CRITICAL');
      expect(record.impact).toBe('CRITICAL');
      expect(record.rawPayload).toBe(raw);
    });

    it('should classify from the combined description', () => {
      const record = normalize(makeEntry({ descriptions: ['** REJECT **: duplicate'] }));
      expect(record.classification).toBe('REJECT');
    });

    it('should use the placeholder description when the list is empty', () => {
      const record = normalize(makeEntry({ descriptions: [] }));
      expect(record.descriptions).toEqual([]);
      expect(record.combinedDescription).toBe(NO_DESCRIPTION);
      expect(record.classification).toBe('VALID');
    });

    it('should treat a missing description block as empty', () => {
      const raw = makeEntry();
      const cve = raw['cve'];
      if (typeof cve === 'object' && cve !== null) Reflect.deleteProperty(cve, 'description');

      expect(normalize(raw).combinedDescription).toBe(NO_DESCRIPTION);
    });

    it('should report NONE impact for an entry without metrics', () => {
      const record = normalize(makeEntry());
      expect(record.impact).toBe('NONE');
      expect(record.cvssV2Severity).toBeUndefined();
      expect(record.cvssV3Severity).toBeUndefined();
    });

    it('should keep the entry when its impact block is malformed', () => {
      const record = normalize({ ...makeEntry(), impact: 'n/a' });
      expect(record.impact).toBe('NONE');
    });

    it('should not modify the raw payload', () => {
      const raw = makeEntry({ v3: { severity: 'LOW' } });
      const before = JSON.stringify(raw);
      normalize(raw);
      expect(JSON.stringify(raw)).toBe(before);
    });

    it('should reject an entry without an id', () => {
      const raw = makeEntry();
      raw['cve'] = { description: { description_data: [] } };
      expect(() => normalize(raw)).toThrow(MalformedRecordError);
    });

    it('should reject a timestamp in another format', () => {
      const raw = makeEntry({ id: 'CVE-2020-1111', publishedDate: '2020-01-01T00:00:00Z' });
      expect(() => normalize(raw)).toThrow(
        'CVE-2020-1111: publishedDate "2020-01-01T00:00:00Z" is not in YYYY-MM-DDThh:mmZ format',
      );
    });

    it('should reject a missing lastModifiedDate', () => {
      const raw = makeEntry();
      delete raw['lastModifiedDate'];
      expect(() => normalize(raw)).toThrow(MalformedRecordError);
    });

    it('should reject a description list of the wrong shape', () => {
      const raw = makeEntry({ id: 'CVE-2020-2222' });
      raw['cve'] = {
        CVE_data_meta: { ID: 'CVE-2020-2222' },
        description: { description_data: 'not a list' },
      };
      try {
        normalize(raw);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedRecordError);
        if (err instanceof MalformedRecordError) expect(err.recordId).toBe('CVE-2020-2222');
      }
    });

    it('should reject non-object input', () => {
      expect(() => normalize(null)).toThrow(MalformedRecordError);
      expect(() => normalize('CVE-2020-0001')).toThrow(MalformedRecordError);
    });
  });

  describe('normalizeAll', () => {
    it('should skip malformed entries and keep the rest in order', () => {
      const entries = [
        makeEntry({ id: 'CVE-2021-0001' }),
        makeEntry({ id: 'CVE-2021-0002', publishedDate: 'yesterday' }),
        { unrelated: true },
        makeEntry({ id: 'CVE-2021-0003' }),
      ];

      const { records, skipped } = normalizeAll(entries);

      expect(records.map((r) => r.id)).toEqual(['CVE-2021-0001', 'CVE-2021-0003']);
      expect(skipped).toHaveLength(2);
      expect(skipped[0]).toMatchObject({ index: 1, id: 'CVE-2021-0002' });
      expect(skipped[1]?.index).toBe(2);
      expect(skipped[1]?.id).toBeUndefined();
    });

    it('should return empty results for an empty batch', () => {
      expect(normalizeAll([])).toEqual({ records: [], skipped: [] });
    });
  });

  describe('parseFeedTimestamp', () => {
    it('should parse as UTC', () => {
      expect(parseFeedTimestamp('1999-12-30T05:00Z').getTime()).toBe(
        Date.UTC(1999, 11, 30, 5, 0),
      );
    });

    it('should reject impossible dates', () => {
      expect(() => parseFeedTimestamp('2021-02-30T10:00Z')).toThrow(MalformedRecordError);
      expect(() => parseFeedTimestamp('2021-01-01T24:00Z')).toThrow(MalformedRecordError);
    });

    it('should reject other formats', () => {
      for (const value of ['2021-01-01', '2021-01-01T10:00', '2021-01-01 10:00Z', '']) {
        expect(() => parseFeedTimestamp(value)).toThrow(MalformedRecordError);
      }
    });
  });
});
