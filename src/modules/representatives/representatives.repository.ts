import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { NewRepresentative, Representative, RepresentativeRow, toRepresentative } from './representative.types';

export type PrayedOrder = 'asc' | 'desc';

/**
 * Data access for the `prayer_candidates` table. Every status transition is a
 * single conditional UPDATE so a concurrent loser sees zero changed rows.
 */
@Injectable()
export class RepresentativesRepository {
  constructor(private readonly database: DatabaseService) {}

  private get db() {
    return this.database.db;
  }

  insertMany(reps: NewRepresentative[], addedAt: string): number {
    const stmt = this.db.prepare<[string, string | null, string, string, string | null, string | null, string]>(
      'INSERT OR IGNORE INTO prayer_candidates (person_name, post_label, country_code, party, thumbnail, hex_id, added_at) VALUES (?, ?, ?, ?, ?, ?, ?)',
    );
    let inserted = 0;
    for (const r of reps) {
      inserted += stmt.run(r.personName, r.postLabel, r.countryCode, r.party, r.thumbnail, r.hexId, addedAt).changes;
    }
    return inserted;
  }

  findById(id: number): Representative | null {
    const row = this.db.prepare<[number], RepresentativeRow>('SELECT * FROM prayer_candidates WHERE id = ?').get(id);
    return row ? toRepresentative(row) : null;
  }

  findFirstQueued(countryCode?: string): Representative | null {
    const row = countryCode
      ? this.db
          .prepare<[string], RepresentativeRow>(
            "SELECT * FROM prayer_candidates WHERE status = 'queued' AND country_code = ? ORDER BY id LIMIT 1",
          )
          .get(countryCode)
      : this.db
          .prepare<[], RepresentativeRow>("SELECT * FROM prayer_candidates WHERE status = 'queued' ORDER BY id LIMIT 1")
          .get();
    return row ? toRepresentative(row) : null;
  }

  findPrayedByIdentity(countryCode: string, personName: string, postLabel: string | null): Representative | null {
    const row = this.db
      .prepare<[string, string, string], RepresentativeRow>(
        "SELECT * FROM prayer_candidates WHERE status = 'prayed' AND country_code = ? AND person_name = ? AND IFNULL(post_label, '') = ?",
      )
      .get(countryCode, personName, postLabel ?? '');
    return row ? toRepresentative(row) : null;
  }

  /** Returns false when the row is missing or not queued. */
  markPrayed(id: number, prayedAt: string): boolean {
    const result = this.db
      .prepare<[string, number]>(
        "UPDATE prayer_candidates SET status = 'prayed', prayed_at = ?, " +
          'prayed_seq = (SELECT COALESCE(MAX(prayed_seq), 0) + 1 FROM prayer_candidates) ' +
          "WHERE id = ? AND status = 'queued'",
      )
      .run(prayedAt, id);
    return result.changes === 1;
  }

  /** Returns false when the row is missing or not prayed. */
  putBack(id: number): boolean {
    const result = this.db
      .prepare<[number]>(
        "UPDATE prayer_candidates SET status = 'queued', prayed_at = NULL, prayed_seq = NULL WHERE id = ? AND status = 'prayed'",
      )
      .run(id);
    return result.changes === 1;
  }

  listQueued(countryCode?: string): Representative[] {
    const rows = countryCode
      ? this.db
          .prepare<[string], RepresentativeRow>(
            "SELECT * FROM prayer_candidates WHERE status = 'queued' AND country_code = ? ORDER BY id",
          )
          .all(countryCode)
      : this.db.prepare<[], RepresentativeRow>("SELECT * FROM prayer_candidates WHERE status = 'queued' ORDER BY id").all();
    return rows.map(toRepresentative);
  }

  listPrayed(countryCode?: string, order: PrayedOrder = 'desc'): Representative[] {
    const direction = order === 'asc' ? 'ASC' : 'DESC';
    const rows = countryCode
      ? this.db
          .prepare<[string], RepresentativeRow>(
            "SELECT * FROM prayer_candidates WHERE status = 'prayed' AND country_code = ? ORDER BY prayed_seq " + direction,
          )
          .all(countryCode)
      : this.db
          .prepare<[], RepresentativeRow>("SELECT * FROM prayer_candidates WHERE status = 'prayed' ORDER BY prayed_seq " + direction)
          .all();
    return rows.map(toRepresentative);
  }

  listByCountry(countryCode: string): Representative[] {
    return this.db
      .prepare<[string], RepresentativeRow>('SELECT * FROM prayer_candidates WHERE country_code = ? ORDER BY id')
      .all(countryCode)
      .map(toRepresentative);
  }

  countByStatus(status: Representative['status'], countryCode?: string): number {
    const row = countryCode
      ? this.db
          .prepare<[string, string], { n: number }>(
            'SELECT COUNT(*) AS n FROM prayer_candidates WHERE status = ? AND country_code = ?',
          )
          .get(status, countryCode)
      : this.db.prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM prayer_candidates WHERE status = ?').get(status);
    return row?.n ?? 0;
  }

  prayedCountsByParty(countryCode: string): { party: string; count: number }[] {
    return this.db
      .prepare<[string], { party: string; count: number }>(
        "SELECT party, COUNT(*) AS count FROM prayer_candidates WHERE status = 'prayed' AND country_code = ? GROUP BY party",
      )
      .all(countryCode);
  }

  deleteByCountries(countryCodes: string[]): number {
    const stmt = this.db.prepare<[string]>('DELETE FROM prayer_candidates WHERE country_code = ?');
    let deleted = 0;
    for (const code of countryCodes) deleted += stmt.run(code).changes;
    return deleted;
  }
}
