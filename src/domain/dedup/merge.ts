import { createEventRecord, PRICE_FIELDS } from '../event.js';
import type { Contact, EventRecord, Location, Pricing, Timing, TimingInput } from '../event.js';

function pickText(base: string, other: string): string {
  return base !== '' ? base : other;
}

function mergeTiming(base: Timing | null, other: Timing | null): TimingInput | null {
  if (base === null) return other;
  if (other === null) return base;

  // A complete start/end pair wins over a partial one; otherwise each
  // missing time is filled on its own.
  const baseComplete = base.startTime !== null && base.endTime !== null;
  const takePair = !baseComplete && other.startTime !== null && other.endTime !== null;
  return {
    startDate: base.startDate,
    endDate: base.endDate ?? (other.endDate !== null && other.endDate >= base.startDate ? other.endDate : null),
    startTime: takePair ? other.startTime : base.startTime ?? other.startTime,
    endTime: takePair ? other.endTime : base.endTime ?? other.endTime,
  };
}

function mergeLocation(base: Location | null, other: Location | null): Location | null {
  if (base === null) return other;
  if (other === null) return base;

  const baseGeocoded = base.latitude !== null && base.longitude !== null;
  const otherGeocoded = other.latitude !== null && other.longitude !== null;
  const takeGeo = !baseGeocoded && otherGeocoded;

  return {
    name: pickText(base.name, other.name),
    address: pickText(base.address, other.address),
    city: pickText(base.city, other.city),
    prefecture: pickText(base.prefecture, other.prefecture),
    latitude: takeGeo ? other.latitude : base.latitude,
    longitude: takeGeo ? other.longitude : base.longitude,
    venueType: pickText(base.venueType, other.venueType),
  };
}

function mergePricing(base: Pricing | null, other: Pricing | null): Pricing | null {
  if (base === null) return other;
  if (other === null) return base;

  const merged = {
    adultPrice: base.adultPrice ?? other.adultPrice,
    childPrice: base.childPrice ?? other.childPrice,
    seniorPrice: base.seniorPrice ?? other.seniorPrice,
    advancePrice: base.advancePrice ?? other.advancePrice,
  };
  const priced = PRICE_FIELDS.some((field) => merged[field] !== null);
  return { ...merged, isFree: priced ? false : base.isFree };
}

function mergeContact(base: Contact | null, other: Contact | null): Contact | null {
  if (base === null) return other;
  if (other === null) return base;
  return {
    organizer: pickText(base.organizer, other.organizer),
    phone: pickText(base.phone, other.phone),
    email: pickText(base.email, other.email),
    website: pickText(base.website, other.website),
  };
}

/**
 * Merge two records describing the same event into a new canonical record.
 *
 * The record with the higher quality score is the base (ties keep `first`).
 * Empty base fields are filled from the other record, the longer
 * description wins, and tags and sources are unioned. Inputs are untouched.
 */
export function mergeRecords(first: EventRecord, second: EventRecord): EventRecord {
  const [base, other] = second.qualityScore > first.qualityScore ? [second, first] : [first, second];

  return createEventRecord({
    title: pickText(base.title, other.title),
    description: other.description.length > base.description.length ? other.description : base.description,
    category: base.category === 'other' ? other.category : base.category,
    timing: mergeTiming(base.timing, other.timing),
    location: mergeLocation(base.location, other.location),
    pricing: mergePricing(base.pricing, other.pricing),
    contact: mergeContact(base.contact, other.contact),
    sourceUrl: pickText(base.sourceUrl, other.sourceUrl),
    sourceSite: base.sourceSite,
    sources: [...base.sources, ...other.sources],
    tags: [...base.tags, ...other.tags],
  });
}
