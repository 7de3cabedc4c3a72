import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { CLOCK, Clock } from '../../common/clock';
import { RepresentativeNotFoundError } from '../../common/errors';
import { DatabaseService } from '../database/database.service';
import { PrayedOrder, RepresentativesRepository } from '../representatives/representatives.repository';
import { NewRepresentative, Representative, identityKey } from '../representatives/representative.types';
import { SourceDataService } from '../source-data/source-data.service';
import { RosterEntry } from '../source-data/source-data.types';
import { assignSeats } from './hex-assignment';

export interface QueueSummary {
  remaining: number;
  queueSize: number;
  totalPrayed: number;
}

export interface PurgeResult {
  purged: number;
  loaded: number;
}

@Injectable()
export class QueueService implements OnApplicationBootstrap {
  private readonly logger = new Logger(QueueService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly representatives: RepresentativesRepository,
    private readonly sourceData: SourceDataService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  onApplicationBootstrap() {
    this.seedIfEmpty();
  }

  nextInQueue(countryCode?: string): Representative | null {
    return this.representatives.findFirstQueued(countryCode);
  }

  markPrayed(id: number): Representative {
    const prayedAt = this.clock.now().toISOString();
    if (!this.representatives.markPrayed(id, prayedAt)) throw new RepresentativeNotFoundError(id, 'queued');
    const rep = this.mustFind(id, 'queued');
    this.logger.log('Prayed for ' + rep.personName + ' (' + rep.countryCode + ', id ' + id + ')');
    return rep;
  }

  putBack(id: number): Representative {
    if (!this.representatives.putBack(id)) throw new RepresentativeNotFoundError(id, 'prayed');
    const rep = this.mustFind(id, 'prayed');
    this.logger.log('Put ' + rep.personName + ' (' + rep.countryCode + ', id ' + id + ') back in the queue');
    return rep;
  }

  putBackByIdentity(personName: string, postLabel: string | null, countryCode: string): Representative {
    const label = postLabel && postLabel.trim().length > 0 ? postLabel : null;
    const rep = this.representatives.findPrayedByIdentity(countryCode, personName, label);
    if (!rep) throw new RepresentativeNotFoundError(personName, 'prayed');
    return this.putBack(rep.id);
  }

  /** Deletes every record of the given countries and reloads their rosters, all in one transaction. */
  purgeAndReload(countryCodes?: string[]): PurgeResult {
    const codes = countryCodes && countryCodes.length > 0 ? countryCodes : this.sourceData.countries.map((c) => c.code);
    codes.forEach((code) => this.sourceData.country(code));

    const result = this.database.transaction(() => {
      const purged = this.representatives.deleteByCountries(codes);
      let loaded = 0;
      for (const code of codes) {
        loaded += this.loadCountry(code, this.sourceData.reloadRoster(code));
      }
      return { purged, loaded };
    });
    this.logger.log('Purged ' + result.purged + ' and reloaded ' + result.loaded + ' representatives for ' + codes.join(', '));
    return result;
  }

  /** Fills the queue at startup unless something is already queued. */
  seedIfEmpty(): number {
    if (this.representatives.countByStatus('queued') > 0) {
      this.logger.log('Queue already populated, skipping seed');
      return 0;
    }
    const loaded = this.database.transaction(() => {
      let total = 0;
      for (const country of this.sourceData.countries) {
        total += this.loadCountry(country.code, this.sourceData.roster(country.code));
      }
      return total;
    });
    this.logger.log('Seeded queue with ' + loaded + ' representatives');
    return loaded;
  }

  listQueued(countryCode?: string): Representative[] {
    return this.representatives.listQueued(countryCode);
  }

  listPrayed(countryCode?: string, order: PrayedOrder = 'desc'): Representative[] {
    return this.representatives.listPrayed(countryCode, order);
  }

  countPrayed(countryCode?: string): number {
    return this.representatives.countByStatus('prayed', countryCode);
  }

  summary(): QueueSummary {
    const totalPrayed = this.countPrayed();
    const possible = this.sourceData.countries.reduce((sum, c) => sum + this.sourceData.rosterSize(c.code), 0);
    return {
      remaining: Math.max(possible - totalPrayed, 0),
      queueSize: this.representatives.countByStatus('queued'),
      totalPrayed,
    };
  }

  /** Inserts roster entries not stored yet, assigning seats for random-placement countries. */
  private loadCountry(countryCode: string, roster: RosterEntry[]): number {
    const country = this.sourceData.country(countryCode);
    const existing = this.representatives.listByCountry(countryCode);
    const known = new Set(existing.map((r) => identityKey(r.personName, r.postLabel)));
    const fresh = roster.filter((entry) => {
      const key = identityKey(entry.personName, entry.postLabel);
      if (known.has(key)) return false;
      known.add(key);
      return true;
    });

    let seats: (string | null)[];
    if (country.placement === 'random') {
      const unitIds = this.sourceData.geometry(countryCode).units.map((u) => u.properties.id);
      const used = new Set(existing.flatMap((r) => (r.hexId ? [r.hexId] : [])));
      seats = assignSeats(countryCode, fresh, unitIds, used).map((a) => {
        if (a.hexId === null) {
          this.logger.warn('No free unit left in ' + countryCode + ' for ' + a.candidate.personName);
        }
        return a.hexId;
      });
    } else {
      seats = fresh.map(() => null);
    }

    const rows: NewRepresentative[] = fresh.map((entry, i) => ({
      countryCode,
      personName: entry.personName,
      party: entry.party,
      postLabel: entry.postLabel,
      thumbnail: entry.thumbnail,
      hexId: seats[i],
    }));
    return this.representatives.insertMany(rows, this.clock.now().toISOString());
  }

  private mustFind(id: number, expected: 'queued' | 'prayed'): Representative {
    const rep = this.representatives.findById(id);
    if (!rep) throw new RepresentativeNotFoundError(id, expected);
    return rep;
  }
}
