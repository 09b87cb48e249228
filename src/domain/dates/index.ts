export type { DateRange } from './parse-date-range.js';
export { parseDateRange, inferYear, MAX_FUTURE_DAYS } from './parse-date-range.js';
