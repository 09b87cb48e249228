import type { Contact, Pricing, TimeOfDay } from '../event.js';
import { fromMinutes } from '../event.js';

/**
 * Field extraction from free listing text (title + description).
 *
 * Every extractor works on NFKC-folded text so full-width digits and
 * colons behave like their ASCII forms.
 */

export interface ExtractedTimes {
  readonly startTime: TimeOfDay | null;
  readonly endTime: TimeOfDay | null;
}

// `10:00`, `午後3時`, `10時30分`, `7時半`; `3時間` is a duration, not a time.
const TIME_TOKEN = /(午前|午後)?\s*(\d{1,2})(?::(\d{2})|時(?!間)(?:(\d{1,2})分|(半))?)/g;
const RANGE_GAP = /^\s*[~〜\-–—]\s*$/;

interface TimeToken {
  readonly minutes: number;
  readonly meridiem: string | undefined;
  readonly hour: number;
  readonly start: number;
  readonly end: number;
}

function toClockMinutes(meridiem: string | undefined, hour: number, minute: number): number | null {
  let h = hour;
  if (meridiem === '午後' && h < 12) h += 12;
  if (h > 23 || minute > 59) return null;
  return h * 60 + minute;
}

function scanTimes(text: string): TimeToken[] {
  const tokens: TimeToken[] = [];
  for (const m of text.matchAll(TIME_TOKEN)) {
    const hour = Number(m[2]);
    const minute = m[5] !== undefined ? 30 : Number(m[3] ?? m[4] ?? 0);
    const minutes = toClockMinutes(m[1], hour, minute);
    if (minutes === null || m.index === undefined) continue;
    tokens.push({ minutes, meridiem: m[1], hour, start: m.index, end: m.index + m[0].length });
  }
  return tokens;
}

/**
 * Start / end time of day. The first `A～B` pair wins; otherwise the first
 * time found is the start. An end written without 午後 after a 午後 start
 * inherits the afternoon (`午後1時～3時` is 13:00–15:00).
 */
export function extractTimes(text: string): ExtractedTimes {
  const folded = text.normalize('NFKC');
  const tokens = scanTimes(folded);

  for (let i = 0; i + 1 < tokens.length; i++) {
    const from = tokens[i];
    const to = tokens[i + 1];
    if (from === undefined || to === undefined) continue;
    if (!RANGE_GAP.test(folded.slice(from.end, to.start))) continue;

    let endMinutes = to.minutes;
    if (to.meridiem === undefined && from.meridiem === '午後' && to.hour < 12) {
      endMinutes = to.minutes + 12 * 60;
    }
    return { startTime: fromMinutes(from.minutes), endTime: fromMinutes(endMinutes) };
  }

  const first = tokens[0];
  return { startTime: first === undefined ? null : fromMinutes(first.minutes), endTime: null };
}

const FREE_WORDS = /入場無料|参加無料|無料|\bfree\b/i;

const PRICE_PATTERNS: readonly (readonly [keyof Omit<Pricing, 'isFree'>, RegExp])[] = [
  ['adultPrice', /(?:大人|一般|高校生以上)\s*[:：]?\s*(\d+)\s*[円¥]/],
  ['childPrice', /(?:子ども|子供|こども|小中学生|小学生)\s*[:：]?\s*(\d+)\s*[円¥]/],
  ['seniorPrice', /(?:シニア|65歳以上)\s*[:：]?\s*(\d+)\s*[円¥]/],
  ['advancePrice', /前売り?券?\s*[:：]?\s*(\d+)\s*[円¥]/],
];

const BARE_PRICE = /(\d+)\s*[円¥]/;

/**
 * Pricing found in the text, or null when nothing price-like appears.
 * A bare amount with no audience label is taken as the adult price.
 */
export function extractPricing(text: string): Partial<Pricing> | null {
  const folded = text.normalize('NFKC').replace(/(\d),(?=\d{3})/g, '$1');

  if (FREE_WORDS.test(folded)) return { isFree: true };

  const pricing: { -readonly [K in keyof Pricing]?: Pricing[K] } = {};
  for (const [field, pattern] of PRICE_PATTERNS) {
    const m = pattern.exec(folded);
    if (m?.[1] !== undefined) pricing[field] = Number(m[1]);
  }

  if (Object.keys(pricing).length === 0) {
    const bare = BARE_PRICE.exec(folded);
    if (bare?.[1] === undefined) return null;
    pricing.adultPrice = Number(bare[1]);
  }

  pricing.isFree = false;
  return pricing;
}

const PHONE = /(?:TEL|電話)\s*[:：]?\s*(\d{2,4}-?\d{2,4}-?\d{3,4})/i;
const EMAIL = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;
const WEBSITE = /https?:\/\/[^\s　]+/;
const ORGANIZER = /主催\s*[:：]\s*([^\s、。]+)/;

export function extractContact(text: string): Partial<Contact> | null {
  const folded = text.normalize('NFKC');

  const contact = {
    phone: PHONE.exec(folded)?.[1] ?? '',
    email: EMAIL.exec(folded)?.[0] ?? '',
    website: WEBSITE.exec(folded)?.[0] ?? '',
    organizer: ORGANIZER.exec(folded)?.[1] ?? '',
  };

  return Object.values(contact).some((v) => v !== '') ? contact : null;
}
