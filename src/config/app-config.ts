import { plainToInstance, Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  MinLength,
  ValidateNested,
  ValidationError,
  validateSync,
} from 'class-validator';
import * as fs from 'fs';
import * as path from 'path';

export const APP_CONFIG = 'APP_CONFIG';

/** Directory holding package.json, config/, data/ and static/ (works from src/ and dist/). */
export const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

export type PlacementMode = 'random' | 'label';

export interface PartyInfo {
  name: string;
  shortName: string;
  color: string;
}

export interface CountryConfig {
  code: string;
  name: string;
  flag: string;
  rosterPath: string;
  geometryPath: string;
  /** CSV of `post_label,name` pairs; only read for `label` placement. */
  labelMappingPath: string | null;
  placement: PlacementMode;
  /** Upper bound on roster rows taken per load; null takes every row. */
  totalRepresentatives: number | null;
  /** Fraction of the image left blank on each side of the map. */
  mapPadding: number;
  parties: PartyInfo[];
}

export interface AppConfig {
  port: number;
  host: string;
  databasePath: string;
  iconsDir: string;
  throttle: { ttl: number; limit: number };
  map: { size: number; iconScale: number };
  countries: CountryConfig[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

class PartyDto {
  @IsString()
  @MinLength(1)
  name!: string;

  @IsString()
  @MinLength(1)
  shortName!: string;

  @Matches(/^#[0-9a-fA-F]{6}$/)
  color!: string;
}

class CountryDto {
  @Matches(/^[a-z][a-z0-9_-]*$/)
  code!: string;

  @IsString()
  @MinLength(1)
  name!: string;

  @IsOptional()
  @IsString()
  flag?: string;

  @IsString()
  @MinLength(1)
  rosterPath!: string;

  @IsString()
  @MinLength(1)
  geometryPath!: string;

  @IsOptional()
  @IsString()
  labelMappingPath?: string;

  @IsIn(['random', 'label'])
  placement!: PlacementMode;

  @IsOptional()
  @IsInt()
  @Min(1)
  totalRepresentatives?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(0.45)
  mapPadding?: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PartyDto)
  parties!: PartyDto[];
}

class CountriesFileDto {
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => CountryDto)
  countries!: CountryDto[];
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  const messages: string[] = [];
  for (const error of errors) {
    const at = prefix ? prefix + '.' + error.property : error.property;
    for (const text of Object.values(error.constraints ?? {})) messages.push(at + ': ' + text);
    if (error.children?.length) messages.push(...flattenErrors(error.children, at));
  }
  return messages;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseCountriesFile(raw: unknown, baseDir: string): CountryConfig[] {
  if (!isPlainObject(raw)) throw new ConfigError('Countries config must be a JSON object with a "countries" array');

  const file = plainToInstance(CountriesFileDto, raw);
  const errors = validateSync(file);
  if (errors.length > 0) {
    throw new ConfigError('Invalid countries config: ' + flattenErrors(errors).join('; '));
  }

  const seen = new Set<string>();
  return file.countries.map((c) => {
    if (seen.has(c.code)) throw new ConfigError('Duplicate country code in config: ' + c.code);
    seen.add(c.code);
    return {
      code: c.code,
      name: c.name,
      flag: c.flag ?? '',
      rosterPath: path.resolve(baseDir, c.rosterPath),
      geometryPath: path.resolve(baseDir, c.geometryPath),
      labelMappingPath: c.labelMappingPath ? path.resolve(baseDir, c.labelMappingPath) : null,
      placement: c.placement,
      totalRepresentatives: c.totalRepresentatives ?? null,
      mapPadding: c.mapPadding ?? 0.1,
      parties: c.parties.map((p) => ({ name: p.name, shortName: p.shortName, color: p.color })),
    };
  });
}

function resolveFromRoot(p: string): string {
  return path.isAbsolute(p) || p === ':memory:' ? p : path.resolve(PROJECT_ROOT, p);
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const countriesPath = resolveFromRoot(env.COUNTRIES_CONFIG || 'config/countries.json');

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(countriesPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError('Cannot read countries config at ' + countriesPath + ': ' + reason);
  }

  return {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || '0.0.0.0',
    databasePath: resolveFromRoot(env.DATABASE_PATH || 'storage/prayreps.sqlite'),
    iconsDir: resolveFromRoot(env.ICONS_DIR || 'static/heart_icons'),
    throttle: {
      ttl: parseInt(env.THROTTLE_TTL || '60', 10) * 1000,
      limit: parseInt(env.THROTTLE_LIMIT || '100', 10),
    },
    map: {
      size: parseInt(env.MAP_SIZE || '1000', 10),
      iconScale: 0.6,
    },
    countries: parseCountriesFile(raw, path.dirname(countriesPath)),
  };
}
