import { Body, Controller, Get, HttpCode, Param, Post, Query } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiQuery, ApiTags } from '@nestjs/swagger';
import { SourceDataService } from '../source-data/source-data.service';
import { NextInQueueQuery, PurgeQueueDto, RepresentativeIdParam } from './dto/queue.dto';
import { QueueService } from './queue.service';

@ApiTags('queue')
@Controller('api/v1/queue')
export class QueueController {
  constructor(
    private readonly queueService: QueueService,
    private readonly sourceData: SourceDataService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List queued representatives in queue order' })
  @ApiQuery({ name: 'country', required: false })
  list(@Query() query: NextInQueueQuery) {
    if (query.country) this.sourceData.country(query.country);
    const data = this.queueService.listQueued(query.country).map((rep) => ({
      ...rep,
      countryName: this.sourceData.findCountry(rep.countryCode)?.name ?? rep.countryCode,
    }));
    return { data, meta: { total: data.length } };
  }

  @Get('next')
  @ApiOperation({ summary: 'Get the next representative to pray for' })
  @ApiQuery({ name: 'country', required: false })
  next(@Query() query: NextInQueueQuery) {
    if (query.country) this.sourceData.country(query.country);
    return { data: this.queueService.nextInQueue(query.country) };
  }

  @Post(':id/prayed')
  @HttpCode(200)
  @ApiOperation({ summary: 'Mark a queued representative as prayed for' })
  @ApiParam({ name: 'id' })
  markPrayed(@Param() params: RepresentativeIdParam) {
    return this.queueService.markPrayed(params.id);
  }

  @Post(':id/put-back')
  @HttpCode(200)
  @ApiOperation({ summary: 'Return a prayed representative to the queue' })
  @ApiParam({ name: 'id' })
  putBack(@Param() params: RepresentativeIdParam) {
    return this.queueService.putBack(params.id);
  }

  @Post('purge')
  @HttpCode(200)
  @ApiOperation({ summary: 'Delete and reload the queue of some or all countries' })
  @ApiBody({ required: false, schema: { properties: { countries: { type: 'array', items: { type: 'string' } } } } })
  purge(@Body() body: PurgeQueueDto) {
    return this.queueService.purgeAndReload(body.countries);
  }
}
