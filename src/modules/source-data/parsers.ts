import { parse } from 'csv-parse/sync';
import type { MultiPolygon, Polygon, Position } from 'geojson';
import { DataLoadError } from '../../common/errors';
import { HeartIcon, RosterEntry, UnitFeature } from './source-data.types';

type CsvRecord = Record<string, string>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCsv(text: string, filePath: string, required: string[]): CsvRecord[] {
  let header: string[] = [];
  let records: unknown;
  try {
    records = parse(text, {
      columns: (names: string[]) => {
        header = names;
        return names;
      },
      bom: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new DataLoadError('Malformed CSV: ' + (error instanceof Error ? error.message : String(error)), filePath);
  }
  if (!Array.isArray(records)) throw new DataLoadError('Malformed CSV', filePath);
  for (const column of required) {
    if (!header.includes(column)) throw new DataLoadError('Missing column "' + column + '"', filePath);
  }

  const rows: CsvRecord[] = [];
  for (const record of records) {
    if (!isRecord(record)) continue;
    const row: CsvRecord = {};
    for (const [key, value] of Object.entries(record)) {
      if (typeof value === 'string') row[key] = value;
    }
    rows.push(row);
  }
  return rows;
}

const blankToNull = (value: string | undefined): string | null => (value && value.length > 0 ? value : null);

/** Roster rows in file order; rows without a name are dropped. */
export function parseRoster(text: string, filePath: string): RosterEntry[] {
  return parseCsv(text, filePath, ['person_name'])
    .filter((row) => (row.person_name ?? '').length > 0)
    .map((row) => ({
      personName: row.person_name,
      party: blankToNull(row.party) ?? 'Other',
      postLabel: blankToNull(row.post_label),
      thumbnail: blankToNull(row.thumbnail),
    }));
}

/** `post_label,name` pairs mapping roster labels to polygon names. */
export function parseLabelMapping(text: string, filePath: string): Map<string, string> {
  const mapping = new Map<string, string>();
  for (const row of parseCsv(text, filePath, ['post_label', 'name'])) {
    if (row.post_label && row.name) mapping.set(row.post_label, row.name);
  }
  return mapping;
}

function isPosition(value: unknown): value is Position {
  return Array.isArray(value) && value.length >= 2 && value.every((n) => typeof n === 'number' && Number.isFinite(n));
}

function isRing(value: unknown): value is Position[] {
  return Array.isArray(value) && value.length >= 4 && value.every(isPosition);
}

function isPolygonCoordinates(value: unknown): value is Position[][] {
  return Array.isArray(value) && value.length > 0 && value.every(isRing);
}

function isMultiPolygonCoordinates(value: unknown): value is Position[][][] {
  return Array.isArray(value) && value.length > 0 && value.every(isPolygonCoordinates);
}

function toGeometry(value: unknown): Polygon | MultiPolygon | null {
  if (!isRecord(value)) return null;
  if (value.type === 'Polygon' && isPolygonCoordinates(value.coordinates)) {
    return { type: 'Polygon', coordinates: value.coordinates };
  }
  if (value.type === 'MultiPolygon' && isMultiPolygonCoordinates(value.coordinates)) {
    return { type: 'MultiPolygon', coordinates: value.coordinates };
  }
  return null;
}

function toUnitId(value: unknown): string | null {
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * Validates a GeoJSON FeatureCollection of Polygon/MultiPolygon units. The
 * unit id is `properties.id`, falling back to the feature id; the name falls
 * back to the id.
 */
export function parseGeometry(text: string, filePath: string): UnitFeature[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DataLoadError('Invalid JSON: ' + (error instanceof Error ? error.message : String(error)), filePath);
  }
  if (!isRecord(raw) || raw.type !== 'FeatureCollection' || !Array.isArray(raw.features)) {
    throw new DataLoadError('Expected a GeoJSON FeatureCollection', filePath);
  }

  const seen = new Set<string>();
  return raw.features.map((feature: unknown, index: number): UnitFeature => {
    if (!isRecord(feature)) throw new DataLoadError('Feature ' + index + ' is not an object', filePath);
    const properties = isRecord(feature.properties) ? feature.properties : {};
    const id = toUnitId(properties.id) ?? toUnitId(feature.id);
    if (id === null) throw new DataLoadError('Feature ' + index + ' has no id', filePath);
    if (seen.has(id)) throw new DataLoadError('Duplicate unit id "' + id + '"', filePath);
    seen.add(id);

    const geometry = toGeometry(feature.geometry);
    if (!geometry) throw new DataLoadError('Unit "' + id + '" is not a valid Polygon or MultiPolygon', filePath);

    const name = typeof properties.name === 'string' && properties.name.length > 0 ? properties.name : id;
    return { type: 'Feature', id, properties: { id, name }, geometry };
  });
}

const SVG_ROOT = /<svg\b([^>]*)>([\s\S]*)<\/svg>/i;

function attribute(attrs: string, name: string): string | null {
  const match = new RegExp('\\s' + name + '\\s*=\\s*"([^"]*)"', 'i').exec(attrs);
  return match ? match[1] : null;
}

/** Extracts the drawing of an SVG icon so it can be nested with its own viewBox. */
export function parseIcon(name: string, text: string, filePath: string): HeartIcon {
  const root = SVG_ROOT.exec(text);
  if (!root) throw new DataLoadError('Not an SVG document', filePath);
  const [, attrs, body] = root;

  let viewBox = attribute(attrs, 'viewBox');
  if (!viewBox) {
    const width = parseFloat(attribute(attrs, 'width') ?? '');
    const height = parseFloat(attribute(attrs, 'height') ?? '');
    if (!(width > 0 && height > 0)) throw new DataLoadError('Icon has neither viewBox nor width/height', filePath);
    viewBox = '0 0 ' + width + ' ' + height;
  }
  return { name, viewBox, body: body.trim() };
}
