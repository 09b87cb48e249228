import type { EventQualityReport } from './validator.js';
import type { IssueCategory, IssueSeverity } from './types.js';

export type QualityGrade = 'A' | 'B' | 'C' | 'D' | 'F';

export interface QualitySummary {
  readonly eventCount: number;
  readonly averages: {
    readonly completeness: number;
    readonly accuracy: number;
    readonly consistency: number;
    readonly reliability: number;
    readonly overall: number;
  };
  readonly issuesBySeverity: Readonly<Record<IssueSeverity, number>>;
  readonly issuesByCategory: Readonly<Partial<Record<IssueCategory, number>>>;
  readonly autoFixesApplied: number;
  readonly grade: QualityGrade;
  readonly suggestions: readonly string[];
}

export function gradeFor(score: number): QualityGrade {
  if (score >= 90) return 'A';
  if (score >= 80) return 'B';
  if (score >= 70) return 'C';
  if (score >= 60) return 'D';
  return 'F';
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/** Batch-level view over per-event quality reports. */
export function summarizeQuality(reports: readonly EventQualityReport[]): QualitySummary {
  const n = reports.length;
  const avg = (pick: (r: EventQualityReport) => number): number =>
    n === 0 ? 0 : round1(reports.reduce((sum, r) => sum + pick(r), 0) / n);

  const averages = {
    completeness: avg((r) => r.metrics.completeness),
    accuracy: avg((r) => r.metrics.accuracy),
    consistency: avg((r) => r.metrics.consistency),
    reliability: avg((r) => r.metrics.reliability),
    overall: avg((r) => r.metrics.overall),
  };

  const issuesBySeverity: Record<IssueSeverity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  const issuesByCategory: Partial<Record<IssueCategory, number>> = {};
  for (const report of reports) {
    for (const issue of report.issues) {
      issuesBySeverity[issue.severity] += 1;
      issuesByCategory[issue.category] = (issuesByCategory[issue.category] ?? 0) + 1;
    }
  }

  const suggestions: string[] = [];
  if (n > 0) {
    if (issuesBySeverity.critical > 0) {
      suggestions.push(`${issuesBySeverity.critical}件の重大な問題を優先的に修正してください`);
    }
    if (averages.completeness < 70) {
      suggestions.push('イベント情報の完全性を向上させてください（説明文、開催場所、連絡先など）');
    }
    if (averages.accuracy < 80) suggestions.push('データの正確性を確認してください');
    if (averages.consistency < 80) suggestions.push('タイトル・カテゴリ・開催場所の整合性を見直してください');
    if (averages.reliability < 80) suggestions.push('情報源の信頼性を確認してください');
  }

  return {
    eventCount: n,
    averages,
    issuesBySeverity,
    issuesByCategory,
    autoFixesApplied: reports.reduce((sum, r) => sum + r.fixesApplied, 0),
    grade: gradeFor(averages.overall),
    suggestions,
  };
}
