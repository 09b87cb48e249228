import { describe, it, expect } from 'vitest';
import { VenueTableGeocoder } from '../../src/infrastructure/index.js';

const geocoder = new VenueTableGeocoder([
  { name: '環水公園', capacity: 5000, venueType: '公園', address: '富山市湊入船町', latitude: 36.7073, longitude: 137.2166 },
  { name: '小ホール', capacity: 300, venueType: 'ホール', address: '', latitude: null, longitude: null },
]);

describe('VenueTableGeocoder', () => {
  it('resolves a known venue, ignoring surrounding whitespace', async () => {
    await expect(geocoder.geocode({ name: ' 環水公園 ', city: '' })).resolves.toEqual({
      latitude: 36.7073,
      longitude: 137.2166,
      formattedAddress: '富山市湊入船町',
    });
  });

  it('returns null for unknown or ungeocoded venues', async () => {
    await expect(geocoder.geocode({ name: '会場A', city: '富山市' })).resolves.toBeNull();
    await expect(geocoder.geocode({ name: '小ホール', city: '' })).resolves.toBeNull();
  });
});
