import { Injectable } from '@nestjs/common';
import { partyClass, partyInfoFor } from '../../common/party';
import { QueueService } from '../queue/queue.service';
import { RepresentativesRepository } from '../representatives/representatives.repository';
import { SourceDataService } from '../source-data/source-data.service';

export const OVERALL = 'overall';

export interface PartyStat {
  name: string;
  shortName: string;
  color: string;
  cssClass: string;
  count: number;
}

export interface TimelineEntry {
  place: string | null;
  person: string;
  party: string;
  country?: string;
}

export interface Timeline {
  timestamps: string[];
  values: TimelineEntry[];
  country_name: string;
}

@Injectable()
export class StatsService {
  constructor(
    private readonly queueService: QueueService,
    private readonly representatives: RepresentativesRepository,
    private readonly sourceData: SourceDataService,
  ) {}

  /** Prayed counts per party of a country, largest first. Parties are merged by short name. */
  partyStats(countryCode: string): PartyStat[] {
    const country = this.sourceData.country(countryCode);
    const byShortName = new Map<string, PartyStat>();
    for (const { party, count } of this.representatives.prayedCountsByParty(countryCode)) {
      const info = partyInfoFor(country, party);
      const stat = byShortName.get(info.shortName);
      if (stat) {
        stat.count += count;
      } else {
        byShortName.set(info.shortName, { ...info, cssClass: partyClass(info.shortName), count });
      }
    }
    return [...byShortName.values()].sort((a, b) => b.count - a.count || a.shortName.localeCompare(b.shortName));
  }

  partyCounts(countryCode: string): Record<string, number> {
    if (countryCode === OVERALL) return { Overall: this.queueService.countPrayed() };
    const counts: Record<string, number> = {};
    for (const stat of this.partyStats(countryCode)) counts[stat.shortName] = stat.count;
    return counts;
  }

  /** Prayers in the order they were recorded. */
  timeline(countryCode: string): Timeline {
    const overall = countryCode === OVERALL;
    const countryName = overall ? 'Overall' : this.sourceData.country(countryCode).name;
    const prayed = this.queueService.listPrayed(overall ? undefined : countryCode, 'asc');

    const timestamps: string[] = [];
    const values: TimelineEntry[] = [];
    for (const rep of prayed) {
      if (!rep.prayedAt) continue;
      timestamps.push(rep.prayedAt);
      const entry: TimelineEntry = { place: rep.postLabel, person: rep.personName, party: rep.party };
      if (overall) entry.country = this.sourceData.findCountry(rep.countryCode)?.name ?? 'Unknown';
      values.push(entry);
    }
    return { timestamps, values, country_name: countryName };
  }
}
