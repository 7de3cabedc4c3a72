import { Inject, Injectable } from '@nestjs/common';
import { CLOCK, Clock } from '../../common/clock';
import { formatPrettyTimestamp } from '../../common/format-timestamp';
import { partyInfoFor } from '../../common/party';
import { MapService } from '../map/map.service';
import { QueueService } from '../queue/queue.service';
import { SourceDataService } from '../source-data/source-data.service';
import { OVERALL } from '../stats/stats.service';
import type { HomePageProps } from '../../views/home-page';
import type { PrayedRow } from '../../views/prayed-page';

/** Gathers what the HTML pages and HTMX fragments display. */
@Injectable()
export class PageDataService {
  constructor(
    private readonly queueService: QueueService,
    private readonly mapService: MapService,
    private readonly sourceData: SourceDataService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  get defaultCountry(): string {
    return this.sourceData.countries[0]?.code ?? OVERALL;
  }

  isKnownCountry(code: string, allowOverall = true): boolean {
    return (allowOverall && code === OVERALL) || this.sourceData.findCountry(code) !== undefined;
  }

  countryTitle(code: string): string {
    return code === OVERALL ? 'Overall' : this.sourceData.country(code).name;
  }

  /** Home page data; the map follows the country of the current representative. */
  home(): HomePageProps {
    const current = this.queueService.nextInQueue();
    const mapCountry = current ? this.sourceData.findCountry(current.countryCode) : this.sourceData.countries[0];
    return {
      current,
      country: current ? this.sourceData.findCountry(current.countryCode) : undefined,
      mapCountryName: mapCountry?.name ?? '',
      mapImagePath: mapCountry ? this.mapService.mapImagePath(mapCountry.code) : null,
      summary: this.queueService.summary(),
    };
  }

  prayedRows(code: string): PrayedRow[] {
    const now = this.clock.now();
    const reps = this.queueService.listPrayed(code === OVERALL ? undefined : code, 'desc');
    return reps.map((rep) => {
      const country = this.sourceData.findCountry(rep.countryCode);
      return {
        id: rep.id,
        personName: rep.personName,
        postLabel: rep.postLabel,
        countryCode: rep.countryCode,
        countryName: country?.name ?? 'Unknown Country',
        party: partyInfoFor(country, rep.party),
        prayedAtLabel: formatPrettyTimestamp(rep.prayedAt, now),
      };
    });
  }
}
