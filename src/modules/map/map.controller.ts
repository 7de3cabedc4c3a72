import { Controller, Get, Header, Param, StreamableFile } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { MapService } from './map.service';

@ApiTags('map')
@Controller()
export class MapController {
  constructor(private readonly mapService: MapService) {}

  @Get('map/:country/hex-map.png')
  @Header('Cache-Control', 'no-cache')
  @ApiOperation({ summary: 'Render the hex map of a country as PNG' })
  @ApiParam({ name: 'country' })
  async image(@Param('country') country: string) {
    const { png } = await this.mapService.renderCountry(country);
    return new StreamableFile(png, { type: 'image/png', length: png.length });
  }

  @Get('api/v1/map/:country')
  @ApiOperation({ summary: 'Get the current map image URL of a country' })
  @ApiParam({ name: 'country' })
  describe(@Param('country') country: string) {
    return { status: 'success', mapImagePath: this.mapService.mapImagePath(country) };
  }
}
