import type { EventRecord, Location } from '../event.js';
import { isWeekend } from '../calendar.js';
import type { SchedulerConfig, TravelConfig } from './types.js';

const EARTH_RADIUS_KM = 6371;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/** Great-circle distance in kilometres. */
export function haversineKm(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const h = Math.sin(dLat / 2) ** 2
    + Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(h));
}

/**
 * Coarse travel time between two venues, in minutes.
 *
 * Uses straight-line distance at a fixed speed when both ends are
 * geocoded, otherwise a flat cross-city / same-city estimate.
 */
export function estimateTravelMinutes(a: Location, b: Location, travel: TravelConfig): number {
  if (a.name === b.name) return 0;

  if (a.latitude !== null && a.longitude !== null && b.latitude !== null && b.longitude !== null) {
    const km = haversineKm(a.latitude, a.longitude, b.latitude, b.longitude);
    return (km / travel.speedKmh) * 60;
  }

  return a.city !== b.city ? travel.crossCityMinutes : travel.sameCityMinutes;
}

/**
 * Expected attendance: category-weighted base, price-penalized,
 * weekend-boosted and scaled by record quality. Never below 10.
 */
export function estimateAttendance(event: EventRecord, config: SchedulerConfig): number {
  let estimate = config.attendanceBase * config.attendanceMultipliers[event.category];

  const pricing = event.pricing;
  if (pricing !== null && !pricing.isFree && pricing.adultPrice !== null && pricing.adultPrice > 1000) {
    estimate *= 0.7;
  }
  if (event.timing !== null && isWeekend(event.timing.startDate)) {
    estimate *= 1.5;
  }
  estimate *= event.qualityScore / 100;

  return Math.max(10, Math.trunc(estimate));
}
