import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { APP_CONFIG, AppConfig, CountryConfig } from '../../config/app-config';
import { DataLoadError, UnknownCountryError } from '../../common/errors';
import { parseGeometry, parseIcon, parseLabelMapping, parseRoster } from './parsers';
import { CountryGeometry, HeartIcon, RosterEntry } from './source-data.types';

function readText(filePath: string, what: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DataLoadError('Cannot read ' + what + ': ' + reason, filePath);
  }
}

/**
 * Country source files: rosters, hex geometry, label mappings and the heart
 * icon set. Everything is read once at startup; rosters are re-read on
 * purge-and-reload.
 */
@Injectable()
export class SourceDataService implements OnModuleInit {
  private readonly logger = new Logger(SourceDataService.name);
  private readonly rosters = new Map<string, RosterEntry[]>();
  private readonly geometries = new Map<string, CountryGeometry>();
  private readonly labelMappings = new Map<string, Map<string, string>>();
  private icons: HeartIcon[] = [];

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  onModuleInit() {
    for (const country of this.config.countries) {
      this.reloadRoster(country.code);
      const units = parseGeometry(readText(country.geometryPath, 'geometry'), country.geometryPath);
      this.geometries.set(country.code, { countryCode: country.code, units });
      if (units.length === 0) this.logger.warn('Geometry for ' + country.code + ' has no units');

      if (country.labelMappingPath) {
        const mapping = parseLabelMapping(readText(country.labelMappingPath, 'label mapping'), country.labelMappingPath);
        this.labelMappings.set(country.code, mapping);
      }
      this.logger.log(
        'Loaded ' + country.code + ': ' + this.rosterSize(country.code) + ' representatives, ' + units.length + ' units',
      );
    }
    this.icons = this.loadIcons();
    this.logger.log('Loaded ' + this.icons.length + ' heart icons');
  }

  country(code: string): CountryConfig {
    const country = this.config.countries.find((c) => c.code === code);
    if (!country) throw new UnknownCountryError(code);
    return country;
  }

  findCountry(code: string): CountryConfig | undefined {
    return this.config.countries.find((c) => c.code === code);
  }

  get countries(): CountryConfig[] {
    return this.config.countries;
  }

  /** Re-reads a roster from disk, capped at the country's `totalRepresentatives`. */
  reloadRoster(code: string): RosterEntry[] {
    const country = this.country(code);
    const entries = parseRoster(readText(country.rosterPath, 'roster'), country.rosterPath);
    const roster = country.totalRepresentatives === null ? entries : entries.slice(0, country.totalRepresentatives);
    this.rosters.set(code, roster);
    return roster;
  }

  roster(code: string): RosterEntry[] {
    return this.rosters.get(code) ?? this.reloadRoster(code);
  }

  rosterSize(code: string): number {
    return this.roster(code).length;
  }

  geometry(code: string): CountryGeometry {
    this.country(code);
    return this.geometries.get(code) ?? { countryCode: code, units: [] };
  }

  labelMapping(code: string): Map<string, string> | null {
    return this.labelMappings.get(code) ?? null;
  }

  heartIcons(): HeartIcon[] {
    return this.icons;
  }

  private loadIcons(): HeartIcon[] {
    const dir = this.config.iconsDir;
    let files: string[];
    try {
      files = fs.readdirSync(dir).filter((f) => f.toLowerCase().endsWith('.svg')).sort();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DataLoadError('Cannot read heart icons directory: ' + reason, dir);
    }
    if (files.length === 0) throw new DataLoadError('No SVG heart icons found', dir);
    return files.map((file) => {
      const filePath = path.join(dir, file);
      return parseIcon(path.basename(file, path.extname(file)), readText(filePath, 'icon'), filePath);
    });
  }
}
