import { PRICE_FIELDS, toMinutes } from '../event.js';
import type { EventRecord } from '../event.js';
import { dayOfWeek, daysBetween } from '../calendar.js';
import type { IssueCategory, IssueSeverity, AutoFixKind, ValidationIssue, ValidationRule } from './types.js';

interface IssueSpec {
  readonly severity: IssueSeverity;
  readonly code: string;
  readonly message: string;
  readonly field: string;
  readonly currentValue?: string | number | null;
  readonly suggestedFix?: string | null;
  readonly fix?: AutoFixKind | null;
  readonly confidence?: number;
}

function issue(event: EventRecord, category: IssueCategory, spec: IssueSpec): ValidationIssue {
  return {
    eventId: event.identityHash,
    eventTitle: event.title,
    category,
    severity: spec.severity,
    code: spec.code,
    message: spec.message,
    field: spec.field,
    currentValue: spec.currentValue ?? null,
    suggestedFix: spec.suggestedFix ?? null,
    fix: spec.fix ?? null,
    confidence: spec.confidence ?? 1,
  };
}

/** Trimmed title with whitespace runs reduced to one space. */
export function tidyWhitespace(title: string): string {
  return title.trim().replace(/\s{2,}/g, ' ');
}

export function createIntegrityRule(): ValidationRule {
  return {
    id: 'integrity',
    category: 'integrity',
    check(event, { today, config }) {
      const issues: ValidationIssue[] = [];

      if (event.title.trim() === '') {
        issues.push(issue(event, 'integrity', {
          severity: 'critical',
          code: 'empty-title',
          message: 'タイトルが空です',
          field: 'title',
          currentValue: event.title,
        }));
      }

      const timing = event.timing;
      if (timing !== null) {
        const ageDays = daysBetween(timing.startDate, today);
        if (ageDays > config.pastToleranceDays) {
          issues.push(issue(event, 'integrity', {
            severity: 'high',
            code: 'start-date-past',
            message: `開始日が${config.pastToleranceDays}日以上前です`,
            field: 'timing.startDate',
            currentValue: timing.startDate,
            confidence: 0.9,
          }));
        }
        if (-ageDays > config.futureYears * 365) {
          issues.push(issue(event, 'integrity', {
            severity: 'medium',
            code: 'start-date-far-future',
            message: `開始日が${config.futureYears}年以上先です`,
            field: 'timing.startDate',
            currentValue: timing.startDate,
            confidence: 0.8,
          }));
        }
        if (timing.endDate !== null && timing.endDate < timing.startDate) {
          issues.push(issue(event, 'integrity', {
            severity: 'critical',
            code: 'end-before-start',
            message: '終了日が開始日より前です',
            field: 'timing.endDate',
            currentValue: timing.endDate,
            suggestedFix: `終了日を${timing.startDate}に修正`,
            fix: 'clamp-end-date',
          }));
        }
      }

      return issues;
    },
  };
}

export function createCompletenessRule(): ValidationRule {
  return {
    id: 'completeness',
    category: 'completeness',
    check(event, { config }) {
      const issues: ValidationIssue[] = [];

      if (event.timing === null) {
        issues.push(issue(event, 'completeness', {
          severity: 'high',
          code: 'missing-timing',
          message: '開催日時が設定されていません',
          field: 'timing',
        }));
      }
      if (event.location === null || event.location.name === '') {
        issues.push(issue(event, 'completeness', {
          severity: 'high',
          code: 'missing-location',
          message: '開催場所が設定されていません',
          field: 'location.name',
        }));
      }
      if (event.description.trim().length < config.minDescriptionLength) {
        issues.push(issue(event, 'completeness', {
          severity: 'medium',
          code: 'short-description',
          message: '説明文が不足しています',
          field: 'description',
          currentValue: event.description.trim().length,
          suggestedFix: 'イベントの詳細説明を追加してください',
        }));
      }
      if (!event.sourceUrl.startsWith('http')) {
        issues.push(issue(event, 'completeness', {
          severity: 'low',
          code: 'missing-source-url',
          message: '情報源URLが設定されていません',
          field: 'sourceUrl',
          currentValue: event.sourceUrl,
        }));
      }

      return issues;
    },
  };
}

export function createConsistencyRule(): ValidationRule {
  return {
    id: 'consistency',
    category: 'consistency',
    check(event, { config }) {
      const issues: ValidationIssue[] = [];
      const title = event.title.toLowerCase();

      if (event.category === 'festival' && !config.festivalWords.some((w) => title.includes(w.toLowerCase()))) {
        issues.push(issue(event, 'consistency', {
          severity: 'low',
          code: 'category-title-mismatch',
          message: 'カテゴリは祭りですがタイトルに祭り関連の語がありません',
          field: 'category',
          currentValue: event.category,
          confidence: 0.6,
        }));
      }

      const titleCity = config.cityNames.find((city) => event.title.includes(city));
      const place = event.location === null ? '' : event.location.city || event.location.address;
      if (titleCity !== undefined && place !== '' && !place.includes(titleCity)
        && config.cityNames.some((city) => place.includes(city))) {
        issues.push(issue(event, 'consistency', {
          severity: 'medium',
          code: 'title-location-mismatch',
          message: `タイトルの地名「${titleCity}」と開催場所が一致しません`,
          field: 'location.city',
          currentValue: place,
          confidence: 0.7,
        }));
      }

      const timing = event.timing;
      const sameDay = timing !== null && (timing.endDate === null || timing.endDate === timing.startDate);
      if (sameDay && timing.startTime !== null && timing.endTime !== null) {
        const start = toMinutes(timing.startTime);
        const end = toMinutes(timing.endTime);
        if (start > end) {
          issues.push(issue(event, 'consistency', {
            severity: 'high',
            code: 'start-after-end-time',
            message: '開始時刻が終了時刻より後です',
            field: 'timing.startTime',
            currentValue: `${timing.startTime}-${timing.endTime}`,
            suggestedFix: '開始時刻と終了時刻を入れ替え',
            fix: 'swap-times',
          }));
        } else if (start === end) {
          issues.push(issue(event, 'consistency', {
            severity: 'high',
            code: 'zero-duration',
            message: '開始時刻と終了時刻が同じです',
            field: 'timing.endTime',
            currentValue: timing.endTime,
          }));
        }
      }

      return issues;
    },
  };
}

export function createAccuracyRule(): ValidationRule {
  return {
    id: 'accuracy',
    category: 'accuracy',
    check(event, { config }) {
      const issues: ValidationIssue[] = [];

      for (const [wrong, right] of config.typos) {
        if (event.title.includes(wrong)) {
          issues.push(issue(event, 'accuracy', {
            severity: 'low',
            code: 'known-typo',
            message: `表記揺れの可能性: 「${wrong}」`,
            field: 'title',
            currentValue: wrong,
            suggestedFix: `「${wrong}」→「${right}」`,
            confidence: 0.8,
          }));
        }
      }

      const pricing = event.pricing;
      if (pricing !== null) {
        for (const field of PRICE_FIELDS) {
          const price = pricing[field];
          if (price === null) continue;
          if (price < 0) {
            issues.push(issue(event, 'accuracy', {
              severity: 'high',
              code: 'negative-price',
              message: '料金が負の値です',
              field: `pricing.${field}`,
              currentValue: price,
              suggestedFix: `${Math.abs(price)}円に修正`,
              fix: 'negate-price',
            }));
          } else if (price > config.maxPrice) {
            issues.push(issue(event, 'accuracy', {
              severity: 'medium',
              code: 'price-out-of-range',
              message: `料金が異常に高額です（${price}円）`,
              field: `pricing.${field}`,
              currentValue: price,
              confidence: 0.7,
            }));
          }
        }
      }

      return issues;
    },
  };
}

const URL_SHAPE = /^https?:\/\/.+/;

export function createFormattingRule(): ValidationRule {
  return {
    id: 'formatting',
    category: 'formatting',
    check(event, { config }) {
      const issues: ValidationIssue[] = [];
      const length = [...event.title.trim()].length;

      if (length > config.maxTitleLength) {
        issues.push(issue(event, 'formatting', {
          severity: 'medium',
          code: 'title-too-long',
          message: `タイトルが長すぎます（${length}文字）`,
          field: 'title',
          currentValue: length,
        }));
      }
      if (length > 0 && length < config.minTitleLength) {
        issues.push(issue(event, 'formatting', {
          severity: 'high',
          code: 'title-too-short',
          message: `タイトルが短すぎます（${length}文字）`,
          field: 'title',
          currentValue: event.title,
        }));
      }

      const tidy = tidyWhitespace(event.title);
      if (tidy !== event.title) {
        issues.push(issue(event, 'formatting', {
          severity: 'low',
          code: 'excess-whitespace',
          message: 'タイトルに余分な空白があります',
          field: 'title',
          currentValue: event.title,
          suggestedFix: tidy,
          fix: 'collapse-whitespace',
        }));
      }

      if (event.sourceUrl !== '' && !URL_SHAPE.test(event.sourceUrl)) {
        issues.push(issue(event, 'formatting', {
          severity: 'medium',
          code: 'malformed-url',
          message: 'URLの形式が不正です',
          field: 'sourceUrl',
          currentValue: event.sourceUrl,
        }));
      }

      return issues;
    },
  };
}

export function createBusinessLogicRule(): ValidationRule {
  return {
    id: 'business-logic',
    category: 'business_logic',
    check(event, { config }) {
      const issues: ValidationIssue[] = [];
      const timing = event.timing;
      if (timing === null) return issues;

      if (timing.endDate !== null && daysBetween(timing.startDate, timing.endDate) > config.maxDurationDays) {
        issues.push(issue(event, 'business_logic', {
          severity: 'medium',
          code: 'long-duration',
          message: `開催期間が${config.maxDurationDays}日を超えています`,
          field: 'timing.endDate',
          currentValue: timing.endDate,
          confidence: 0.8,
        }));
      }

      const dow = dayOfWeek(timing.startDate);
      if (event.category === 'festival' && dow >= 1 && dow <= 5) {
        issues.push(issue(event, 'business_logic', {
          severity: 'info',
          code: 'weekday-festival',
          message: '祭りが平日に開催されます',
          field: 'timing.startDate',
          currentValue: timing.startDate,
          confidence: 0.5,
        }));
      }

      return issues;
    },
  };
}

export function createSuspiciousDataRule(): ValidationRule {
  return {
    id: 'suspicious-data',
    category: 'suspicious_data',
    check(event, { config }) {
      return config.suspiciousPatterns
        .filter((source) => new RegExp(source, 'i').test(event.title))
        .map((source) => issue(event, 'suspicious_data', {
          severity: 'high',
          code: 'suspicious-content',
          message: `不審なパターンが検出されました: ${source}`,
          field: 'title',
          currentValue: event.title,
          confidence: 0.7,
        }));
    },
  };
}

/** Every rule group, in reporting order. */
export function createDefaultRules(): ValidationRule[] {
  return [
    createIntegrityRule(),
    createCompletenessRule(),
    createConsistencyRule(),
    createAccuracyRule(),
    createFormattingRule(),
    createBusinessLogicRule(),
    createSuspiciousDataRule(),
  ];
}
