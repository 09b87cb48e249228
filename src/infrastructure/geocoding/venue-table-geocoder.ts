import type { Geocoder, GeocodeQuery, GeocodeResult } from '../../application/index.js';
import type { VenueInfo } from '../../domain/index.js';

/**
 * Geocoder backed by the configured venue table.
 *
 * Resolves a venue only when its name is in the table with both
 * coordinates set. Lookups are exact on the venue name; the city is
 * not consulted.
 */
export class VenueTableGeocoder implements Geocoder {
  private readonly venues: ReadonlyMap<string, VenueInfo>;

  constructor(venues: readonly VenueInfo[]) {
    this.venues = new Map(venues.map((v) => [v.name, v]));
  }

  async geocode(query: GeocodeQuery): Promise<GeocodeResult | null> {
    const venue = this.venues.get(query.name.trim());
    if (venue === undefined || venue.latitude === null || venue.longitude === null) return null;
    return {
      latitude: venue.latitude,
      longitude: venue.longitude,
      formattedAddress: venue.address,
    };
  }
}
