export type {
  EventPriority,
  ConflictType,
  ScheduleConflict,
  ConflictFinding,
  ConflictDetector,
  DetectorContext,
  VenueInfo,
  TravelConfig,
  SchedulerConfig,
  OptimizationResult,
  ScheduleReport,
} from './types.js';
export { PRIORITY_RANK } from './types.js';
export { haversineKm, estimateTravelMinutes, estimateAttendance } from './estimates.js';
export {
  createTimeOverlapDetector,
  createVenueCapacityDetector,
  createTravelTimeDetector,
  createCategoryClashDetector,
  createDefaultDetectors,
  dateRangesIntersect,
  eventsOverlap,
} from './detectors.js';
export { SmartScheduler, DEFAULT_SCHEDULER_CONFIG } from './scheduler.js';
