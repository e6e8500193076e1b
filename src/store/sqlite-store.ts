/**
 * SQLite-backed RecordStore (better-sqlite3).
 *
 * Only one importer may write to a database file at a time: replaceAll
 * drops the table inside its transaction, so concurrent importers would
 * overwrite each other's work.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import type { VulnerabilityRecord } from '../schemas/record.schema.js';
import { StoreError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { toRow, type CountQuery, type RecordStore } from './record-store.js';

const log = createLogger('store');

export const TABLE_NAME = 'cves';

const CREATE_TABLE = `
  CREATE TABLE ${TABLE_NAME} (
    sequenceNum      INTEGER NOT NULL,
    id               TEXT NOT NULL,
    lastModifiedDate TEXT NOT NULL,
    publishedDate    TEXT NOT NULL,
    classification   TEXT NOT NULL,
    severityV3       TEXT,
    severityV2       TEXT,
    impact           TEXT NOT NULL,
    description      TEXT NOT NULL,
    rawPayload       TEXT NOT NULL
  );
  CREATE INDEX ${TABLE_NAME}_id ON ${TABLE_NAME} (id);
  CREATE INDEX ${TABLE_NAME}_published ON ${TABLE_NAME} (publishedDate);
`;

const INSERT_ROW = `
  INSERT INTO ${TABLE_NAME} (
    sequenceNum, id, lastModifiedDate, publishedDate, classification,
    severityV3, severityV2, impact, description, rawPayload
  ) VALUES (
    @sequenceNum, @id, @lastModifiedDate, @publishedDate, @classification,
    @severityV3, @severityV2, @impact, @description, @rawPayload
  )
`;

const CountRow = z.object({ n: z.number().int() });
const RawRow = z.object({ rawPayload: z.string() });

export class SqliteRecordStore implements RecordStore {
  private readonly db: Database.Database;

  /**
   * @param filename - Database file, or ":memory:"
   */
  constructor(filename: string) {
    try {
      this.db = new Database(filename);
    } catch (err) {
      throw new StoreError(`Cannot open database ${filename}: ${errorMessage(err)}`, err);
    }
  }

  replaceAll(records: readonly VulnerabilityRecord[]): number {
    const rebuild = this.db.transaction((batch: readonly VulnerabilityRecord[]) => {
      this.db.exec(`DROP TABLE IF EXISTS ${TABLE_NAME}`);
      this.db.exec(CREATE_TABLE);
      const insert = this.db.prepare(INSERT_ROW);
      batch.forEach((record, i) => insert.run(toRow(record, i + 1)));
      return batch.length;
    });

    try {
      const written = rebuild(records);
      log.info(`Wrote ${written} rows to ${TABLE_NAME}`);
      return written;
    } catch (err) {
      throw new StoreError(`Rebuilding ${TABLE_NAME} failed: ${errorMessage(err)}`, err);
    }
  }

  count(query: CountQuery = {}): number {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (query.year !== undefined) {
      clauses.push('substr(publishedDate, 1, 4) = ?');
      params.push(String(query.year).padStart(4, '0'));
    }
    const filters: Array<[column: string, value: string | undefined]> = [
      ['classification', query.classification],
      ['severityV2', query.severityV2],
      ['severityV3', query.severityV3],
      ['impact', query.impact],
    ];
    for (const [column, value] of filters) {
      if (value === undefined) continue;
      clauses.push(`${column} = ?`);
      params.push(value);
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
    const row = this.query(`SELECT COUNT(*) AS n FROM ${TABLE_NAME}${where}`, params);
    return CountRow.parse(row).n;
  }

  getRawById(id: string): unknown {
    const row = this.query(
      `SELECT rawPayload FROM ${TABLE_NAME} WHERE id = ? ORDER BY sequenceNum LIMIT 1`,
      [id],
    );
    if (row === undefined) return undefined;
    return JSON.parse(RawRow.parse(row).rawPayload);
  }

  close(): void {
    this.db.close();
  }

  private query(sql: string, params: Array<string | number>): unknown {
    if (!this.hasTable()) {
      throw new StoreError(`No ${TABLE_NAME} table yet; run an import first`);
    }
    try {
      return this.db.prepare(sql).get(...params);
    } catch (err) {
      throw new StoreError(`Query failed: ${errorMessage(err)}`, err);
    }
  }

  private hasTable(): boolean {
    const row = this.db
      .prepare(`SELECT COUNT(*) AS n FROM sqlite_master WHERE type = 'table' AND name = ?`)
      .get(TABLE_NAME);
    return CountRow.parse(row).n > 0;
  }
}
