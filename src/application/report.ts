import { monthKey } from '../domain/index.js';
import type {
  ConfidenceLevel,
  ConflictType,
  DeduplicationResult,
  EventCategory,
  EventRecord,
  IsoDate,
  MatchType,
  OptimizationResult,
  QualityLevel,
  QualitySummary,
} from '../domain/index.js';

export const TOP_EVENT_LIMIT = 10;
export const TOP_MATCH_LIMIT = 5;

export const PIPELINE_STEPS = ['ingest', 'geocode', 'deduplicate', 'validate', 'schedule', 'report'] as const;
export type PipelineStep = (typeof PIPELINE_STEPS)[number];

export interface TopEvent {
  readonly title: string;
  readonly startDate: IsoDate | null;
  readonly location: string;
  readonly category: EventCategory;
  readonly qualityScore: number;
  readonly sourceSite: string;
}

export interface DuplicateReport {
  readonly originalCount: number;
  readonly deduplicatedCount: number;
  readonly mergedCount: number;
  /** Share of input records absorbed by merges, in percent (one decimal). */
  readonly reductionPercent: number;
  readonly byMatchType: Readonly<Partial<Record<Exclude<MatchType, 'different_event'>, number>>>;
  readonly byConfidenceLevel: Readonly<Record<ConfidenceLevel, number>>;
  readonly topMatches: readonly {
    readonly left: string;
    readonly right: string;
    readonly matchType: MatchType;
    readonly confidence: number;
    readonly reasoning: readonly string[];
  }[];
  readonly processingTimeMs: number;
}

export interface ScheduleSummary {
  readonly conflictCount: number;
  readonly resolvedCount: number;
  readonly remainingCount: number;
  readonly score: number;
  readonly byType: Readonly<Partial<Record<ConflictType, number>>>;
  readonly recommendations: readonly string[];
}

export interface PipelineReport {
  readonly processing: {
    readonly inputCount: number;
    readonly failedCount: number;
    readonly finalCount: number;
    readonly autoFixesApplied: number;
    readonly duplicatesRemoved: number;
    readonly durationMs: number;
    readonly completedSteps: readonly PipelineStep[];
  };
  readonly distribution: {
    readonly byCategory: Readonly<Partial<Record<EventCategory, number>>>;
    readonly byQualityLevel: Readonly<Partial<Record<QualityLevel, number>>>;
    readonly bySource: Readonly<Record<string, number>>;
    readonly byMonth: Readonly<Record<string, number>>;
  };
  readonly topEvents: readonly TopEvent[];
  readonly duplicates: DuplicateReport;
  readonly quality: QualitySummary;
  readonly schedule: ScheduleSummary;
  readonly recommendations: readonly string[];
}

export interface ReportInput {
  readonly events: readonly EventRecord[];
  readonly failedCount: number;
  readonly dedup: DeduplicationResult;
  readonly quality: QualitySummary;
  readonly optimization: OptimizationResult;
  readonly durationMs: number;
  readonly completedSteps: readonly PipelineStep[];
}

function tally<K extends string>(keys: readonly K[]): Partial<Record<K, number>> {
  const counts: Partial<Record<K, number>> = {};
  for (const key of keys) counts[key] = (counts[key] ?? 0) + 1;
  return counts;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function topEvents(events: readonly EventRecord[], limit: number = TOP_EVENT_LIMIT): TopEvent[] {
  return [...events]
    .sort((a, b) => b.qualityScore - a.qualityScore)
    .slice(0, limit)
    .map((e) => ({
      title: e.title,
      startDate: e.timing?.startDate ?? null,
      location: e.location?.name ?? '',
      category: e.category,
      qualityScore: e.qualityScore,
      sourceSite: e.sourceSite,
    }));
}

export function buildDuplicateReport(dedup: DeduplicationResult): DuplicateReport {
  return {
    originalCount: dedup.originalCount,
    deduplicatedCount: dedup.deduplicatedCount,
    mergedCount: dedup.mergedCount,
    reductionPercent: dedup.originalCount === 0
      ? 0
      : round1(((dedup.originalCount - dedup.deduplicatedCount) / dedup.originalCount) * 100),
    byMatchType: tally(dedup.matches.map((m) => m.matchType)),
    byConfidenceLevel: dedup.confidenceDistribution,
    topMatches: dedup.matches.slice(0, TOP_MATCH_LIMIT).map((m) => ({
      left: m.left.title,
      right: m.right.title,
      matchType: m.matchType,
      confidence: m.confidence,
      reasoning: m.reasoning,
    })),
    processingTimeMs: dedup.processingTimeMs,
  };
}

export function buildScheduleSummary(optimization: OptimizationResult): ScheduleSummary {
  return {
    conflictCount: optimization.conflicts.length,
    resolvedCount: optimization.resolved.length,
    remainingCount: optimization.remaining.length,
    score: optimization.score,
    byType: tally(optimization.remaining.map((c) => c.type)),
    recommendations: optimization.recommendations,
  };
}

/** Batch-level advice in Japanese, derived from the step outcomes. */
export function pipelineRecommendations(input: ReportInput, bySource: Readonly<Record<string, number>>): string[] {
  const recommendations: string[] = [];

  if (input.quality.averages.overall < 70) {
    recommendations.push('データ品質が低いです。より多くの詳細情報の収集を検討してください');
  }
  if (input.dedup.matches.length > input.dedup.originalCount * 0.1) {
    recommendations.push('重複が多く検出されました。データソースの重複チェックを強化してください');
  }
  if (input.optimization.remaining.length > 0) {
    recommendations.push('スケジュール競合があります。イベントの時間調整を検討してください');
  }
  const counts = Object.values(bySource);
  const total = counts.reduce((sum, n) => sum + n, 0);
  if (counts.length > 1 && Math.max(...counts) > total * 0.7) {
    recommendations.push('特定のソースに依存度が高いです。情報源の多様化を検討してください');
  }
  if (input.failedCount > 0) {
    recommendations.push(`${input.failedCount}件のレコードを取り込めませんでした。日付やタイトルの形式を確認してください`);
  }

  return recommendations;
}

export function buildPipelineReport(input: ReportInput): PipelineReport {
  const { events } = input;

  const bySource: Record<string, number> = {};
  const byMonth: Record<string, number> = {};
  for (const e of events) {
    for (const site of e.sources) bySource[site] = (bySource[site] ?? 0) + 1;
    if (e.timing !== null) {
      const month = monthKey(e.timing.startDate);
      byMonth[month] = (byMonth[month] ?? 0) + 1;
    }
  }

  return {
    processing: {
      inputCount: input.dedup.originalCount + input.failedCount,
      failedCount: input.failedCount,
      finalCount: events.length,
      autoFixesApplied: input.quality.autoFixesApplied,
      duplicatesRemoved: input.dedup.originalCount - input.dedup.deduplicatedCount,
      durationMs: input.durationMs,
      completedSteps: input.completedSteps,
    },
    distribution: {
      byCategory: tally(events.map((e) => e.category)),
      byQualityLevel: tally(events.map((e) => e.qualityLevel)),
      bySource,
      byMonth,
    },
    topEvents: topEvents(events),
    duplicates: buildDuplicateReport(input.dedup),
    quality: input.quality,
    schedule: buildScheduleSummary(input.optimization),
    recommendations: pipelineRecommendations(input, bySource),
  };
}
