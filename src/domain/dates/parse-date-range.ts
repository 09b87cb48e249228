import type { IsoDate } from '../event.js';
import { DateParseError } from '../errors.js';
import { daysBetween, isValidDate, parseIsoDate, toIsoDate } from '../calendar.js';
import type { DateParts } from '../calendar.js';

export interface DateRange {
  readonly start: IsoDate;
  readonly end: IsoDate | null;
}

/** Anything resolving further ahead than this is treated as misparsed. */
export const MAX_FUTURE_DAYS = 730;
const PAST_TOLERANCE_DAYS = 30;

const ERA_BASE: Readonly<Record<string, number>> = { 令和: 2018, 平成: 1988 };

// Parenthesized / circled weekday glyphs: ㈪…㈰ ㈷ ㈹ ㉁ ㊊…㊐ ㊗ ㊡
const WEEKDAY_GLYPHS = /[㈪-㈰㈷㈹㉁㊊-㊐㊗㊡]/g;
const PARENTHETICAL = /[(（][^()（）]*[)）]/g;
const CLOCK_TIME = /\d{1,2}:\d{2}/g;
const KANJI_TIME = /(?:午前|午後)?\d{1,2}時(?:\d{1,2}分|半)?/g;
const ERA_YEAR = /(令和|平成)\s*(\d{1,2}|元)\s*年/g;
const DASHED_DATE = /(\d{4})[-.](\d{1,2})[-.](\d{1,2})/g;

const RANGE_SEPARATOR = /[〜~～–—-]/;
const LIST_SEPARATOR = /[・、]/;

const FULL_DATE = /(\d{4})\s*[年/]\s*(\d{1,2})\s*[月/]\s*(\d{1,2})\s*日?/;
const MONTH_DAY = /(\d{1,2})\s*[月/]\s*(\d{1,2})\s*日?/;
const BARE_DAY = /^(\d{1,2})\s*日?$/;
const ADJACENT_SHORTHAND = /^(\d{4})年(\d{1,2})月(\d{1,2})日[^\d年月/]*?(\d{1,2})日$/;

type DateExpression =
  | { readonly kind: 'full'; readonly year: number; readonly month: number; readonly day: number }
  | { readonly kind: 'month-day'; readonly month: number; readonly day: number }
  | { readonly kind: 'day'; readonly day: number };

/**
 * Folds width variants and removes everything that is not part of a date:
 * weekday annotations, parentheticals and clock times. Era years become
 * western years and dashed dates become slashed so `-` stays a separator.
 */
function clean(text: string): string {
  return text
    .replace(WEEKDAY_GLYPHS, ' ')
    .normalize('NFKC')
    .replace(PARENTHETICAL, ' ')
    .replace(CLOCK_TIME, ' ')
    .replace(KANJI_TIME, ' ')
    .replace(ERA_YEAR, (_m, era: string, n: string) =>
      `${(ERA_BASE[era] ?? 0) + (n === '元' ? 1 : Number(n))}年`)
    .replace(DASHED_DATE, '$1/$2/$3')
    .replace(/から/g, '~')
    .replace(/まで/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function readExpression(token: string, allowBareDay: boolean): DateExpression | null {
  const full = FULL_DATE.exec(token);
  if (full !== null) {
    return { kind: 'full', year: Number(full[1]), month: Number(full[2]), day: Number(full[3]) };
  }
  const md = MONTH_DAY.exec(token);
  if (md !== null) {
    return { kind: 'month-day', month: Number(md[1]), day: Number(md[2]) };
  }
  if (allowBareDay) {
    const day = BARE_DAY.exec(token.trim());
    if (day !== null) return { kind: 'day', day: Number(day[1]) };
  }
  return null;
}

/** Year for a month/day given without one. */
export function inferYear(month: number, day: number, today: IsoDate): number {
  const t = parseIsoDate(today);
  if ((t.month === 11 || t.month === 12) && month >= 1 && month <= 4) {
    return t.year + 1;
  }
  if (!isValidDate(t.year, month, day)) return t.year + 1;
  if (daysBetween(toIsoDate(t.year, month, day), today) > PAST_TOLERANCE_DAYS) {
    return t.year + 1;
  }
  return t.year;
}

function checked(year: number, month: number, day: number, today: IsoDate): IsoDate | null {
  if (!isValidDate(year, month, day)) return null;
  const iso = toIsoDate(year, month, day);
  return daysBetween(today, iso) > MAX_FUTURE_DAYS ? null : iso;
}

/** Resolve an expression; `anchor` supplies the missing year/month of a range end. */
function resolve(expr: DateExpression, today: IsoDate, anchor: DateParts | null): IsoDate | null {
  switch (expr.kind) {
    case 'full':
      return checked(expr.year, expr.month, expr.day, today);
    case 'month-day': {
      const year = anchor !== null ? anchor.year : inferYear(expr.month, expr.day, today);
      return checked(year, expr.month, expr.day, today);
    }
    case 'day':
      if (anchor === null) return null;
      return checked(anchor.year, anchor.month, expr.day, today);
  }
}

function resolveEnd(expr: DateExpression, start: IsoDate, today: IsoDate): IsoDate | null {
  const anchor = parseIsoDate(start);
  const end = resolve(expr, today, anchor);
  if (end === null) return null;
  if (end >= start) return end;
  // "12/28〜1/3" wraps into the following year
  if (expr.kind === 'month-day') {
    const wrapped = checked(anchor.year + 1, expr.month, expr.day, today);
    if (wrapped !== null && wrapped >= start) return wrapped;
  }
  return null;
}

function adjacentShorthand(text: string, today: IsoDate): DateRange | null {
  const m = ADJACENT_SHORTHAND.exec(text);
  if (m === null) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const start = checked(year, month, Number(m[3]), today);
  const end = checked(year, month, Number(m[4]), today);
  if (start === null || end === null || end <= start) return null;
  return { start, end };
}

function dateList(text: string, today: IsoDate): DateRange | null {
  if (!LIST_SEPARATOR.test(text)) return null;
  const parts = text.split(LIST_SEPARATOR).map((p) => p.trim()).filter((p) => p !== '');
  const [first, ...rest] = parts;
  if (first === undefined || rest.length === 0) return null;

  const startExpr = readExpression(first, false);
  if (startExpr === null) return null;
  const start = resolve(startExpr, today, null);
  if (start === null) return null;

  for (let i = rest.length - 1; i >= 0; i--) {
    const part = rest[i];
    if (part === undefined) continue;
    const expr = readExpression(part, true);
    if (expr === null) continue;
    const end = resolveEnd(expr, start, today);
    return end === null ? null : { start, end };
  }
  return null;
}

function explicitRange(text: string, today: IsoDate): DateRange | null {
  if (!RANGE_SEPARATOR.test(text)) return null;
  const parts = text.split(RANGE_SEPARATOR).map((p) => p.trim()).filter((p) => p !== '');
  if (parts.length !== 2) return null;
  const [left, right] = parts;
  if (left === undefined || right === undefined) return null;

  const startExpr = readExpression(left, false);
  const endExpr = readExpression(right, true);
  if (startExpr === null || endExpr === null) return null;

  const start = resolve(startExpr, today, null);
  if (start === null) return null;
  const end = resolveEnd(endExpr, start, today);
  return end === null ? null : { start, end };
}

function singleDate(text: string, today: IsoDate): DateRange | null {
  const expr = readExpression(text, false);
  if (expr === null) return null;
  const start = resolve(expr, today, null);
  return start === null ? null : { start, end: null };
}

const SHAPES = [adjacentShorthand, dateList, explicitRange] as const;

/**
 * Parse loosely formatted Japanese/English date text into a range.
 *
 * Range shapes are tried in order (adjacent shorthand, `・`/`、` list,
 * explicit separator) before falling back to the first single date found.
 *
 * @throws DateParseError when no plausible date can be recovered.
 */
export function parseDateRange(text: string, today: IsoDate): DateRange {
  const cleaned = clean(text);
  if (cleaned === '') {
    throw new DateParseError(text, 'empty date text');
  }

  for (const shape of SHAPES) {
    const range = shape(cleaned, today);
    if (range !== null) return range;
  }

  const single = singleDate(cleaned, today);
  if (single !== null) return single;

  const hasToken = readExpression(cleaned, false) !== null;
  throw new DateParseError(
    text,
    hasToken ? `date is invalid or more than ${MAX_FUTURE_DAYS} days ahead` : 'no date token found',
  );
}
