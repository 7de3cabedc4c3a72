import type { Feature, MultiPolygon, Polygon } from 'geojson';

export interface RosterEntry {
  personName: string;
  party: string;
  postLabel: string | null;
  thumbnail: string | null;
}

export type UnitProperties = {
  id: string;
  name: string;
};

export type UnitFeature = Feature<Polygon | MultiPolygon, UnitProperties>;

export interface CountryGeometry {
  countryCode: string;
  /** In file order. */
  units: UnitFeature[];
}

/** A heart icon ready to be nested inside the map document. */
export interface HeartIcon {
  name: string;
  viewBox: string;
  body: string;
}
