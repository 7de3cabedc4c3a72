import { Body, Controller, Header, HttpCode, Logger, NotFoundException, Post, Redirect, UseFilters } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { CurrentItemPanel } from '../../views/current-item';
import { MapPanel } from '../../views/map-panel';
import { PrayedTable } from '../../views/prayed-page';
import { renderFragments } from '../../views/render';
import { StatsSummary } from '../../views/stats-summary';
import { MapService } from '../map/map.service';
import { QueueService } from '../queue/queue.service';
import { SourceDataService } from '../source-data/source-data.service';
import { HtmxNotFoundFilter } from './htmx-not-found.filter';
import { PageDataService } from './page-data.service';
import { ProcessPrayerDto, PutBackDto, PutBackFormDto } from './prayer.dto';

const HTML = 'text/html; charset=utf-8';

@ApiExcludeController()
@Controller('prayer')
export class PrayerController {
  private readonly logger = new Logger(PrayerController.name);

  constructor(
    private readonly queueService: QueueService,
    private readonly mapService: MapService,
    private readonly sourceData: SourceDataService,
    private readonly pageData: PageDataService,
  ) {}

  /** Marks the representative prayed; returns the next item plus out-of-band map and stats. */
  @Post('process')
  @HttpCode(200)
  @Header('Content-Type', HTML)
  @UseFilters(HtmxNotFoundFilter)
  process(@Body() body: ProcessPrayerDto) {
    const prayed = this.queueService.markPrayed(body.id);
    const country = this.sourceData.country(prayed.countryCode);
    const next = this.queueService.nextInQueue();

    return renderFragments(
      <CurrentItemPanel current={next} country={next ? this.sourceData.findCountry(next.countryCode) : undefined} />,
      <MapPanel countryName={country.name} mapImagePath={this.mapService.mapImagePath(country.code)} oob />,
      <StatsSummary summary={this.queueService.summary()} oob />,
    );
  }

  @Post('process-form')
  @Redirect('/', 303)
  processForm(@Body() body: ProcessPrayerDto) {
    try {
      this.queueService.markPrayed(body.id);
    } catch (error) {
      if (!(error instanceof NotFoundException)) throw error;
      this.logger.warn(error.message);
    }
  }

  @Post('put-back')
  @HttpCode(200)
  @Header('Content-Type', HTML)
  @UseFilters(HtmxNotFoundFilter)
  putBack(@Body() body: PutBackDto) {
    this.sourceData.country(body.country_code);
    this.queueService.putBack(body.id);
    return renderFragments(<PrayedTable rows={this.pageData.prayedRows(body.country_code)} countryCode={body.country_code} />);
  }

  @Post('put-back-form')
  @Redirect()
  putBackForm(@Body() body: PutBackFormDto) {
    const known = this.pageData.isKnownCountry(body.country_code, false);
    if (known) {
      try {
        this.queueService.putBackByIdentity(body.person_name, body.post_label ?? null, body.country_code);
      } catch (error) {
        if (!(error instanceof NotFoundException)) throw error;
        this.logger.warn(error.message);
      }
    }
    return { url: '/prayed/' + (known ? body.country_code : this.pageData.defaultCountry), statusCode: 303 };
  }
}
