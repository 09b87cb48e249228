import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import {
  DEFAULT_ENRICHMENT_CONFIG,
  DEFAULT_NORMALIZER_CONFIG,
  DEFAULT_QUALITY_CONFIG,
  DEFAULT_SCHEDULER_CONFIG,
  DEFAULT_SIMILARITY_CONFIG,
  EVENT_CATEGORIES,
} from '../../domain/index.js';
import { DEFAULT_MIN_QUALITY_SCORE, DEFAULT_TIME_ZONE } from '../../application/index.js';
import type { Log, PipelineSettings } from '../../application/index.js';
import { SIMILARITY_BACKENDS } from '../similarity/backend.js';
import type { SimilarityBackendName } from '../similarity/backend.js';

/**
 * Pipeline configuration: every tunable table and threshold of the domain
 * modules, plus the process-level choices around them.
 */
export interface PipelineConfig {
  readonly settings: PipelineSettings;
  readonly timeZone: string;
  readonly similarityBackend: SimilarityBackendName;
  readonly sync: { readonly minQualityScore: number };
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  settings: {
    normalizer: DEFAULT_NORMALIZER_CONFIG,
    similarity: DEFAULT_SIMILARITY_CONFIG,
    quality: DEFAULT_QUALITY_CONFIG,
    scheduler: DEFAULT_SCHEDULER_CONFIG,
    enrichment: DEFAULT_ENRICHMENT_CONFIG,
    autoMerge: true,
    autoFix: true,
  },
  timeZone: DEFAULT_TIME_ZONE,
  similarityBackend: 'indel',
  sync: { minQualityScore: DEFAULT_MIN_QUALITY_SCORE },
};

const pair = z.tuple([z.string().min(1), z.string().min(1)]);
const words = z.array(z.string().min(1));
const unit = z.number().min(0).max(1);

const venueSchema = z.object({
  name: z.string().min(1),
  capacity: z.number().int().positive(),
  venueType: z.string().default(''),
  address: z.string().default(''),
  latitude: z.number().min(-90).max(90).nullable().default(null),
  longitude: z.number().min(-180).max(180).nullable().default(null),
});

/** Shape of `config/pipeline.json`. Every key is optional; sections merge over the defaults. */
export const pipelineConfigFileSchema = z.object({
  timeZone: z.string().min(1),
  autoMerge: z.boolean(),
  autoFix: z.boolean(),
  similarity: z.object({
    backend: z.enum(SIMILARITY_BACKENDS),
    weights: z.object({ title: unit, date: unit, location: unit, category: unit, source: unit }).partial(),
    sameSourceScore: unit,
  }).partial(),
  normalizer: z.object({
    synonyms: z.array(pair),
    venueSynonyms: z.array(pair),
    prefectures: words,
    municipalities: words,
    protectedNames: words,
    stopwords: words,
  }).partial(),
  quality: z.object({
    pastToleranceDays: z.number().int().min(0),
    futureYears: z.number().int().min(1),
    minTitleLength: z.number().int().min(1),
    maxTitleLength: z.number().int().min(1),
    minDescriptionLength: z.number().int().min(0),
    maxPrice: z.number().int().positive(),
    maxDurationDays: z.number().int().positive(),
    cityNames: words,
    festivalWords: words,
    typos: z.array(pair),
    suspiciousPatterns: words,
  }).partial(),
  scheduler: z.object({
    venues: z.array(venueSchema),
    attendanceBase: z.number().positive(),
    shiftMinutes: z.number().int().min(1).max(180),
    travel: z.object({
      speedKmh: z.number().positive(),
      crossCityMinutes: z.number().min(0),
      sameCityMinutes: z.number().min(0),
    }).partial(),
    clashCategories: z.array(z.enum(EVENT_CATEGORIES)),
  }).partial(),
  sync: z.object({ minQualityScore: z.number().min(0).max(100) }).partial(),
}).partial().strict();

export type PipelineConfigFile = z.infer<typeof pipelineConfigFileSchema>;

/** Merge a validated override over the defaults, section by section. */
export function mergePipelineConfig(file: PipelineConfigFile, base: PipelineConfig = DEFAULT_PIPELINE_CONFIG): PipelineConfig {
  const { settings } = base;
  const similarityFile: NonNullable<PipelineConfigFile['similarity']> = file.similarity ?? {};
  const schedulerFile: NonNullable<PipelineConfigFile['scheduler']> = file.scheduler ?? {};
  const { backend, weights, ...similarity } = similarityFile;
  const { travel, ...scheduler } = schedulerFile;

  return {
    settings: {
      normalizer: { ...settings.normalizer, ...file.normalizer },
      similarity: {
        ...settings.similarity,
        ...similarity,
        weights: { ...settings.similarity.weights, ...weights },
      },
      quality: { ...settings.quality, ...file.quality },
      scheduler: {
        ...settings.scheduler,
        ...scheduler,
        travel: { ...settings.scheduler.travel, ...travel },
      },
      enrichment: {
        ...settings.enrichment,
        municipalities: file.normalizer?.municipalities ?? settings.enrichment.municipalities,
        prefectures: file.normalizer?.prefectures ?? settings.enrichment.prefectures,
      },
      autoMerge: file.autoMerge ?? settings.autoMerge,
      autoFix: file.autoFix ?? settings.autoFix,
    },
    timeZone: file.timeZone ?? base.timeZone,
    similarityBackend: backend ?? base.similarityBackend,
    sync: { ...base.sync, ...file.sync },
  };
}

/**
 * Loads pipeline configuration from JSON.
 *
 * A missing file yields DEFAULT_PIPELINE_CONFIG. A file that cannot be read,
 * parsed or validated also yields the defaults, with a warning naming why.
 */
export function loadPipelineConfig(configPath: string | undefined, log: Log): PipelineConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'pipeline.json');

  if (!existsSync(filePath)) {
    log.debug({ filePath }, 'No pipeline config file, using defaults');
    return DEFAULT_PIPELINE_CONFIG;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err: unknown) {
    log.warn({ err, filePath }, 'Pipeline config unreadable, using defaults');
    return DEFAULT_PIPELINE_CONFIG;
  }

  const parsed = pipelineConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn({ filePath, issues: parsed.error.issues }, 'Pipeline config invalid, using defaults');
    return DEFAULT_PIPELINE_CONFIG;
  }

  log.info({ filePath }, 'Pipeline config loaded');
  return mergePipelineConfig(parsed.data);
}
