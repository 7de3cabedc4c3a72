import { geoIdentity, geoPath } from 'd3-geo';
import type { FeatureCollection, MultiPolygon, Polygon } from 'geojson';
import type { RepresentativeStatus } from '../representatives/representative.types';
import type { HeartIcon, UnitFeature, UnitProperties } from '../source-data/source-data.types';

export type UnitState = 'highlight' | 'prayed' | 'default';

export interface MapMarker {
  representativeId: number;
  personName: string;
  /** Polygon id the representative sits in; null when unresolved. */
  unitKey: string | null;
  status: RepresentativeStatus;
  inFocus: boolean;
}

export interface MapRenderOptions {
  size: number;
  /** Fraction of the image kept blank on each side. */
  padding: number;
  iconScale: number;
}

export interface ComposeInput {
  countryName: string;
  units: UnitFeature[];
  markers: MapMarker[];
  icons: HeartIcon[];
  options: MapRenderOptions;
}

export interface ComposeResult {
  svg: string;
  /** Markers whose unit could not be found in the geometry. */
  skipped: MapMarker[];
}

const STYLES: Record<UnitState, string> = {
  highlight: 'fill="#ffff00" fill-opacity="0.7" stroke="#000000" stroke-width="2.5"',
  prayed: 'fill="#ffffff" stroke="#d3d3d3" stroke-width="1"',
  default: 'fill="#ffffff" stroke="#d3d3d3" stroke-width="1"',
};

export interface UnitMark {
  state: UnitState;
  /** Representative whose id picks the heart icon. */
  iconFor: number | null;
}

const BLANK: UnitMark = { state: 'default', iconFor: null };

const round = (n: number) => String(Math.round(n * 100) / 100);

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function svgOpen(size: number): string {
  return (
    '<svg xmlns="http://www.w3.org/2000/svg" width="' + size + '" height="' + size + '" viewBox="0 0 ' + size + ' ' + size + '">' +
    '<rect width="' + size + '" height="' + size + '" fill="#ffffff"/>'
  );
}

export function placeholderSvg(countryName: string, size: number): string {
  return (
    svgOpen(size) +
    '<text x="' + size / 2 + '" y="' + size / 2 + '" text-anchor="middle" font-family="sans-serif" font-size="' + Math.round(size / 25) + '" fill="#666666">' +
    'Map data unavailable for ' + escapeXml(countryName) +
    '</text></svg>'
  );
}

/**
 * Assigns a state to every unit: the in-focus unit is highlighted, units
 * holding a prayed representative get a heart, the rest stay blank.
 */
export function resolveUnitStates(units: UnitFeature[], markers: MapMarker[]) {
  const ids = new Set(units.map((u) => u.properties.id));
  const states = new Map<string, UnitMark>();
  const skipped: MapMarker[] = [];

  for (const marker of markers) {
    if (marker.unitKey === null || !ids.has(marker.unitKey)) {
      skipped.push(marker);
      continue;
    }
    const current: UnitMark = states.get(marker.unitKey) ?? { ...BLANK };
    if (marker.status === 'queued' && marker.inFocus) {
      current.state = 'highlight';
    } else if (marker.status === 'prayed') {
      if (current.state !== 'highlight') current.state = 'prayed';
      if (current.iconFor === null) current.iconFor = marker.representativeId;
    }
    states.set(marker.unitKey, current);
  }
  return { states, skipped };
}

function iconMarkup(icon: HeartIcon, bounds: [[number, number], [number, number]], scale: number): string {
  const [[x0, y0], [x1, y1]] = bounds;
  const side = Math.min(x1 - x0, y1 - y0) * scale;
  const x = (x0 + x1) / 2 - side / 2;
  const y = (y0 + y1) / 2 - side / 2;
  return (
    '<svg x="' + round(x) + '" y="' + round(y) + '" width="' + round(side) + '" height="' + round(side) + '" ' +
    'viewBox="' + escapeXml(icon.viewBox) + '" preserveAspectRatio="xMidYMid meet">' + icon.body + '</svg>'
  );
}

/** Builds the SVG document for one country's hex map. Pure: same input, same bytes. */
export function composeMapSvg(input: ComposeInput): ComposeResult {
  const { units, markers, icons, options } = input;
  if (units.length === 0) {
    return { svg: placeholderSvg(input.countryName, options.size), skipped: markers };
  }

  const collection: FeatureCollection<Polygon | MultiPolygon, UnitProperties> = { type: 'FeatureCollection', features: units };
  const inset = (options.size * options.padding) / (1 + 2 * options.padding);
  const projection = geoIdentity()
    .reflectY(true)
    .fitExtent(
      [
        [inset, inset],
        [options.size - inset, options.size - inset],
      ],
      collection,
    );
  const path = geoPath(projection);

  const { states, skipped } = resolveUnitStates(units, markers);
  const shapes: string[] = [];
  const hearts: string[] = [];

  for (const unit of units) {
    const { state, iconFor } = states.get(unit.properties.id) ?? BLANK;
    const d = path(unit) ?? '';
    shapes.push(
      '<path d="' + d + '" data-unit="' + escapeXml(unit.properties.id) + '" data-state="' + state + '" ' + STYLES[state] + '/>',
    );
    if (state === 'prayed' && iconFor !== null && icons.length > 0) {
      hearts.push(iconMarkup(icons[iconFor % icons.length], path.bounds(unit), options.iconScale));
    }
  }

  return { svg: svgOpen(options.size) + shapes.join('') + hearts.join('') + '</svg>', skipped };
}
