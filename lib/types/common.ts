/**
 * Common types shared across the data model.
 */

/** A WGS84 position. lat in [-90, 90], lng in [-180, 180]. */
export interface Coordinate {
  lat: number;
  lng: number;
}
