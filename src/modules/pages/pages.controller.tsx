import { Controller, Get, Header, Param, Post, Redirect, Res } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import type { FastifyReply } from 'fastify';
import { AboutPage } from '../../views/about-page';
import { HomePage } from '../../views/home-page';
import { PrayedPage } from '../../views/prayed-page';
import { QueuePage } from '../../views/queue-page';
import { renderPage } from '../../views/render';
import { StatsPage } from '../../views/stats-page';
import { QueueService } from '../queue/queue.service';
import { SourceDataService } from '../source-data/source-data.service';
import { OVERALL, StatsService } from '../stats/stats.service';
import { PageDataService } from './page-data.service';

const HTML = 'text/html; charset=utf-8';

@ApiExcludeController()
@Controller()
export class PagesController {
  constructor(
    private readonly pageData: PageDataService,
    private readonly queueService: QueueService,
    private readonly statsService: StatsService,
    private readonly sourceData: SourceDataService,
  ) {}

  @Get()
  @Header('Content-Type', HTML)
  home() {
    return renderPage(<HomePage {...this.pageData.home()} />);
  }

  @Get('about')
  @Header('Content-Type', HTML)
  about() {
    return renderPage(<AboutPage countries={this.sourceData.countries} />);
  }

  @Get('queue')
  @Header('Content-Type', HTML)
  queue() {
    return renderPage(<QueuePage queue={this.queueService.listQueued()} countries={this.sourceData.countries} />);
  }

  @Get('prayed')
  @Redirect()
  prayedDefault() {
    return { url: '/prayed/' + this.pageData.defaultCountry };
  }

  @Get('prayed/:country')
  prayed(@Param('country') country: string, @Res() reply: FastifyReply) {
    if (!this.pageData.isKnownCountry(country)) return reply.redirect(302, '/prayed/' + this.pageData.defaultCountry);
    const page = (
      <PrayedPage
        rows={this.pageData.prayedRows(country)}
        countryCode={country}
        title={this.pageData.countryTitle(country)}
        countries={this.sourceData.countries}
      />
    );
    return reply.type(HTML).send(renderPage(page));
  }

  @Get('stats')
  @Redirect()
  statsDefault() {
    return { url: '/stats/' + this.pageData.defaultCountry };
  }

  @Get('stats/:country')
  stats(@Param('country') country: string, @Res() reply: FastifyReply) {
    if (!this.pageData.isKnownCountry(country)) return reply.redirect(302, '/stats/' + this.pageData.defaultCountry);
    const page = (
      <StatsPage
        countryCode={country}
        title={this.pageData.countryTitle(country)}
        countries={this.sourceData.countries}
        parties={country === OVERALL ? [] : this.statsService.partyStats(country)}
        totalPrayed={this.queueService.countPrayed(country === OVERALL ? undefined : country)}
      />
    );
    return reply.type(HTML).send(renderPage(page));
  }

  @Get('refresh')
  @Redirect('/')
  refresh() {}

  @Post('purge')
  @Redirect('/', 303)
  purge() {
    this.queueService.purgeAndReload();
  }
}
