export interface ZipLocation {
  zipCode: string;
  city: string;
  state: string;
  latitude: number;
  longitude: number;
}

/**
 * A zip code inside the search radius, with its distance from the origin
 */
export interface LocationCandidate extends ZipLocation {
  distanceMiles: number;
}

export interface RadiusQuery {
  originZip: string;
  radiusMiles: number;
}
