import { Inject, Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import sharp from 'sharp';
import { APP_CONFIG, AppConfig, CountryConfig } from '../../config/app-config';
import { QueueService } from '../queue/queue.service';
import { RepresentativesRepository } from '../representatives/representatives.repository';
import { Representative } from '../representatives/representative.types';
import { SourceDataService } from '../source-data/source-data.service';
import { composeMapSvg, MapMarker } from './map-composer';

export interface RenderedMap {
  png: Buffer;
  version: string;
}

/**
 * Resolves representatives to polygons and renders each country's map to
 * PNG. Renders are cached per country until the marker set changes.
 */
@Injectable()
export class MapService {
  private readonly logger = new Logger(MapService.name);
  private readonly cache = new Map<string, { version: string; rendering: Promise<RenderedMap> }>();

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly sourceData: SourceDataService,
    private readonly representatives: RepresentativesRepository,
    private readonly queueService: QueueService,
  ) {}

  markers(countryCode: string): MapMarker[] {
    const country = this.sourceData.country(countryCode);
    const focus = this.queueService.nextInQueue(countryCode);
    const unitIdsByName = new Map(
      this.sourceData.geometry(countryCode).units.map((u): [string, string] => [u.properties.name, u.properties.id]),
    );
    const mapping = this.sourceData.labelMapping(countryCode);

    return this.representatives
      .listByCountry(countryCode)
      .filter((rep) => rep.status === 'prayed' || rep.id === focus?.id)
      .map((rep) => ({
        representativeId: rep.id,
        personName: rep.personName,
        unitKey: this.unitKey(country, rep, unitIdsByName, mapping),
        status: rep.status,
        inFocus: rep.id === focus?.id,
      }));
  }

  /** Cache key for the current state of a country's map. */
  version(countryCode: string): string {
    return this.fingerprint(this.markers(countryCode));
  }

  renderSvg(countryCode: string): string {
    return this.compose(countryCode, this.markers(countryCode));
  }

  /** Concurrent callers for the same marker set share one rasterisation. */
  renderCountry(countryCode: string): Promise<RenderedMap> {
    const markers = this.markers(countryCode);
    const version = this.fingerprint(markers);
    const cached = this.cache.get(countryCode);
    if (cached && cached.version === version) return cached.rendering;

    const rendering = this.rasterise(countryCode, markers, version);
    this.cache.set(countryCode, { version, rendering });
    rendering.catch(() => {
      if (this.cache.get(countryCode)?.rendering === rendering) this.cache.delete(countryCode);
    });
    return rendering;
  }

  mapImagePath(countryCode: string): string {
    return '/map/' + encodeURIComponent(countryCode) + '/hex-map.png?v=' + this.version(countryCode);
  }

  private async rasterise(countryCode: string, markers: MapMarker[], version: string): Promise<RenderedMap> {
    const started = Date.now();
    const png = await sharp(Buffer.from(this.compose(countryCode, markers))).png().toBuffer();
    this.logger.log('Rendered ' + countryCode + ' map v' + version + ' in ' + (Date.now() - started) + 'ms');
    return { png, version };
  }

  private compose(countryCode: string, markers: MapMarker[]): string {
    const country = this.sourceData.country(countryCode);
    const { svg, skipped } = composeMapSvg({
      countryName: country.name,
      units: this.sourceData.geometry(countryCode).units,
      markers,
      icons: this.sourceData.heartIcons(),
      options: { size: this.config.map.size, padding: country.mapPadding, iconScale: this.config.map.iconScale },
    });
    for (const marker of skipped) {
      this.logger.warn(
        'No map unit "' + (marker.unitKey ?? '') + '" in ' + countryCode + ' for ' + marker.personName + ' (id ' + marker.representativeId + ')',
      );
    }
    return svg;
  }

  private unitKey(
    country: CountryConfig,
    rep: Representative,
    unitIdsByName: Map<string, string>,
    mapping: Map<string, string> | null,
  ): string | null {
    if (country.placement === 'random') return rep.hexId;
    if (rep.postLabel === null) return null;
    const name = mapping?.get(rep.postLabel) ?? rep.postLabel;
    return unitIdsByName.get(name) ?? name;
  }

  private fingerprint(markers: MapMarker[]): string {
    const state = markers.map((m) => [m.representativeId, m.unitKey, m.status, m.inFocus]);
    return createHash('sha256').update(JSON.stringify(state)).digest('hex').slice(0, 12);
  }
}
