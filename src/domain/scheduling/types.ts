import type { EventCategory, EventRecord, QualityLevel } from '../event.js';

export type EventPriority = 'critical' | 'high' | 'medium' | 'low' | 'flexible';

export const PRIORITY_RANK: Readonly<Record<EventPriority, number>> = {
  critical: 5,
  high: 4,
  medium: 3,
  low: 2,
  flexible: 1,
};

export type ConflictType = 'time_overlap' | 'venue_capacity' | 'travel_time' | 'category_clash';

/**
 * A conflict between two events of one scheduling pass.
 *
 * `firstId` / `secondId` index into the event list the pass was run on.
 */
export interface ScheduleConflict {
  readonly type: ConflictType;
  readonly firstId: number;
  readonly secondId: number;
  readonly first: EventRecord;
  readonly second: EventRecord;
  readonly severity: number;
  readonly description: string;
  readonly suggestions: readonly string[];
  readonly autoResolvable: boolean;
}

/** What a detector reports for one pair; ids are attached by the scheduler. */
export interface ConflictFinding {
  readonly severity: number;
  readonly description: string;
  readonly suggestions: readonly string[];
  readonly autoResolvable: boolean;
}

export interface VenueInfo {
  readonly name: string;
  readonly capacity: number;
  readonly venueType: string;
  readonly address: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
}

export interface TravelConfig {
  readonly speedKmh: number;
  readonly crossCityMinutes: number;
  readonly sameCityMinutes: number;
}

export interface SchedulerConfig {
  readonly venues: readonly VenueInfo[];
  /** Case-insensitive regular expression sources matched against titles. */
  readonly criticalPatterns: readonly string[];
  readonly highPatterns: readonly string[];
  readonly categoryPriority: Readonly<Partial<Record<EventCategory, EventPriority>>>;
  readonly attendanceBase: number;
  readonly attendanceMultipliers: Readonly<Record<EventCategory, number>>;
  readonly travel: TravelConfig;
  readonly shiftMinutes: number;
  /** Categories that compete for the same audience. */
  readonly clashCategories: readonly EventCategory[];
  readonly autoResolveBelow: {
    readonly timeOverlap: number;
    readonly travelTime: number;
  };
}

export interface DetectorContext {
  readonly config: SchedulerConfig;
  readonly venues: ReadonlyMap<string, VenueInfo>;
}

/** One conflict type, evaluated pairwise. Pure. */
export interface ConflictDetector {
  readonly type: ConflictType;
  detect(a: EventRecord, b: EventRecord, context: DetectorContext): ConflictFinding | null;
}

export interface OptimizationResult {
  readonly optimizedEvents: readonly EventRecord[];
  readonly conflicts: readonly ScheduleConflict[];
  readonly resolved: readonly ScheduleConflict[];
  readonly remaining: readonly ScheduleConflict[];
  readonly score: number;
  readonly recommendations: readonly string[];
}

export interface ScheduleReport {
  readonly totalEvents: number;
  readonly conflictsRemaining: number;
  readonly conflictsResolved: number;
  readonly optimizationScore: number;
  readonly byCategory: Readonly<Partial<Record<EventCategory, number>>>;
  readonly byDate: Readonly<Record<string, number>>;
  readonly busiestDates: readonly { readonly date: string; readonly count: number }[];
  readonly byPriority: Readonly<Record<EventPriority, number>>;
  readonly highPriorityCount: number;
  readonly byQualityLevel: Readonly<Record<QualityLevel, number>>;
  readonly remaining: readonly ScheduleConflict[];
  readonly recommendations: readonly string[];
  readonly insights: readonly string[];
}
