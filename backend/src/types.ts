/**
 * @fileoverview Domain records shared across the district analysis pipeline.
 */

/**
 * A WGS84 point in degrees.
 */
export interface Coordinate {
  lat: number;
  lon: number;
}

export type OsmElementType = 'node' | 'way' | 'relation';

/** Tag keys the pipeline reads; everything else stays in the raw tag map. */
export const TAG_KEYS = {
  street: 'addr:street',
  postcode: 'addr:postcode',
  name: 'name',
  shop: 'shop',
  amenity: 'amenity',
  office: 'office',
  building: 'building',
  landuse: 'landuse',
  highway: 'highway',
} as const;

export type TagName = keyof typeof TAG_KEYS;

export type Tags = Readonly<Record<string, string>>;

/** Category keys in the order they are checked when classifying a POI. */
export const CATEGORY_KEYS = ['shop', 'amenity', 'office', 'building', 'landuse'] as const;

export type CategoryKey = (typeof CATEGORY_KEYS)[number];

/**
 * A point of interest returned by the POI query.
 * Areas (ways, relations) are represented by their centroid.
 */
export interface Poi {
  osm_id: number;
  osm_type: OsmElementType;
  kind: 'point' | 'area';
  location: Coordinate;
  tags: Tags;
  street: string | null;
  postcode: string | null;
  name: string | null;
  category: { key: CategoryKey; value: string } | null;
}

/**
 * A named highway segment. Several segments may share one name.
 */
export interface Street {
  osm_id: number;
  name: string;
  location: Coordinate;
  highway: string | null;
}

export type AttributionMethod = 'tag' | 'nearest' | 'none';

export interface Attribution {
  poi_id: number;
  street: string | null;
  method: AttributionMethod;
  /** Distance to the nearest street centroid, when one was computed. */
  distance_m: number | null;
}

export interface StreetCount {
  name: string;
  count: number;
}

/**
 * Selectors that decide which POIs are fetched.
 */
export interface PoiFilters {
  include_all_shops: boolean;
  shop_types: string[];
  amenities: string[];
  property_selectors: string[];
}

/**
 * Parameters shared by every district of a job.
 */
export interface AnalysisParams {
  radius_m: number;
  max_assign_m: number;
  top_n: number;
  filters: PoiFilters;
}

/**
 * Outcome of analysing one district. Failed results have the same shape,
 * with zeroed counts and empty street lists.
 */
export interface DistrictResult {
  district: string;
  success: boolean;
  error: string | null;
  center: Coordinate | null;
  total_pois: number;
  total_streets: number;
  top_streets: StreetCount[];
  all_streets: StreetCount[];
}

/**
 * Reads a recognised tag. Empty values count as absent.
 */
export function getTag(tags: Tags, name: TagName): string | null {
  const value = tags[TAG_KEYS[name]];
  return value === undefined || value === '' ? null : value;
}
