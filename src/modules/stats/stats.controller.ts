import { Controller, Get, Param } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { StatsService } from './stats.service';

@ApiTags('stats')
@Controller('stats')
export class StatsController {
  constructor(private readonly statsService: StatsService) {}

  @Get('data/:country')
  @ApiOperation({ summary: 'Prayed counts per party, largest first' })
  @ApiParam({ name: 'country', description: 'Country code or "overall"' })
  data(@Param('country') country: string) {
    return this.statsService.partyCounts(country);
  }

  @Get('timedata/:country')
  @ApiOperation({ summary: 'Prayer timeline in recording order' })
  @ApiParam({ name: 'country', description: 'Country code or "overall"' })
  timedata(@Param('country') country: string) {
    return this.statsService.timeline(country);
  }
}
