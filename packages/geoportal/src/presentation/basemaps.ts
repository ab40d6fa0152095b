/**
 * Basemap table
 *
 * Fixed set of tile providers the rendering collaborator can draw under a
 * dataset. Keys are the names shown to the end user.
 */

export const BASEMAP_KEYS = ['OpenStreetMap', 'CartoDB Positron', 'Stamen Terrain'] as const;

export type BasemapKey = (typeof BASEMAP_KEYS)[number];

export interface BasemapDefinition {
  readonly key: BasemapKey;
  /** Tile-source identifier understood by the map widget */
  readonly tiles: string;
  readonly url: string;
  readonly attribution: string;
  readonly maxZoom: number;
}

export const DEFAULT_BASEMAP: BasemapKey = 'OpenStreetMap';

export const BASEMAPS: Readonly<Record<BasemapKey, BasemapDefinition>> = {
  OpenStreetMap: {
    key: 'OpenStreetMap',
    tiles: 'OpenStreetMap',
    url: 'https://tile.openstreetmap.org/{z}/{x}/{y}.png',
    attribution: '© OpenStreetMap contributors',
    maxZoom: 19,
  },
  'CartoDB Positron': {
    key: 'CartoDB Positron',
    tiles: 'CartoDB Positron',
    url: 'https://{s}.basemaps.cartocdn.com/light_all/{z}/{x}/{y}.png',
    attribution: '© OpenStreetMap contributors © CartoDB',
    maxZoom: 20,
  },
  'Stamen Terrain': {
    key: 'Stamen Terrain',
    tiles: 'Stamen Terrain',
    url: 'https://tiles.stadiamaps.com/tiles/stamen_terrain/{z}/{x}/{y}.png',
    attribution:
      'Map tiles by Stamen Design, under CC BY 3.0. Data © OpenStreetMap contributors',
    maxZoom: 18,
  },
};

export function isBasemapKey(value: string): value is BasemapKey {
  return BASEMAP_KEYS.some((key) => key === value);
}

/**
 * Look up a basemap, falling back to the default for unknown keys
 */
export function getBasemap(key: string | undefined, fallback: BasemapKey = DEFAULT_BASEMAP): BasemapDefinition {
  if (key !== undefined && isBasemapKey(key)) {
    return BASEMAPS[key];
  }
  return BASEMAPS[fallback];
}

export function listBasemaps(): readonly BasemapDefinition[] {
  return BASEMAP_KEYS.map((key) => BASEMAPS[key]);
}
