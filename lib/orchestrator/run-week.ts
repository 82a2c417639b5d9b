import { serverEnv } from '@/lib/env/server';
import { createLogger, type Logger } from '@/lib/log';
import { ContextStore, success, type StageResult } from '@/lib/pipeline';
import {
  DAY_NUMBERS,
  formatWeekStart,
  parseWeekStart,
  weekStartFor,
  type Clock,
  type DayNumber,
} from '@/lib/planner';
import {
  collectBrandProfile,
  collectBusinessProfile,
  selectPlatforms,
  type Platform,
} from '@/lib/intake';
import { buildStrategy, type StrategyFramework } from '@/lib/strategy';
import { buildCalendar, planDailyPosts, type ContentCalendar } from '@/lib/content';
import { recommendHashtags, type HashtagRecommendation } from '@/lib/hashtags';
import {
  analyzeBrandVisuals,
  generateVisualConcept,
  type BrandVisualGuidelines,
  type VisualConcept,
} from '@/lib/visuals';
import { generateSummary, type StrategySummary } from '@/lib/summary';

export interface PlanningInputs {
  business: unknown;
  brand: unknown;
  platforms: unknown;
}

export interface PlanningOptions {
  /** Defaults to PLANNER_SEED, then the week start */
  seed?: number | string;
  /** Defaults to PLANNER_WEEK_START, then the current week */
  weekStart?: Date;
  clock?: Clock;
  brandedTags?: readonly string[];
  /** Up to three `#RRGGBB` brand colors; a default palette otherwise */
  brandColors?: string;
  logger?: Logger;
  /** Days left ungenerated, so the calendar fills them with placeholders */
  skipDays?: readonly DayNumber[];
}

export interface PlanningRun {
  store: ContextStore;
  platformGuidance: Partial<Record<Platform, string>>;
  strategy: StrategyFramework;
  calendar: ContentCalendar;
  /** Optimized per post; `finalSet` is the published set */
  hashtags: HashtagRecommendation[];
  visuals: BrandVisualGuidelines;
  visualConcepts: VisualConcept[];
  summary: StrategySummary;
}

function report<T>(logger: Logger, stage: string, result: StageResult<T>): StageResult<T> {
  if (result.status === 'error') {
    logger.error(`${stage} failed: ${result.message}`, {
      kind: result.error.kind,
      details: result.error.details,
    });
  } else {
    logger.info(`${stage}: ${result.message}`);
  }
  return result;
}

function resolveWeekStart(options: PlanningOptions, clock: Clock): Date {
  if (options.weekStart) return weekStartFor(options.weekStart);
  const configured = serverEnv.PLANNER_WEEK_START
    ? parseWeekStart(serverEnv.PLANNER_WEEK_START)
    : null;
  return configured ?? weekStartFor(clock());
}

/**
 * Run every stage for one week on a fresh store, stopping at the first error
 */
export function runPlanningPipeline(
  inputs: PlanningInputs,
  options: PlanningOptions = {}
): StageResult<PlanningRun> {
  const logger = options.logger ?? createLogger('planner');
  const clock = options.clock ?? (() => new Date());
  const weekStart = resolveWeekStart(options, clock);
  const seed = options.seed ?? serverEnv.PLANNER_SEED ?? formatWeekStart(weekStart);
  const store = new ContextStore();

  logger.info('Planning week', { weekStart: formatWeekStart(weekStart), seed });

  const business = report(logger, 'intake', collectBusinessProfile(store, inputs.business));
  if (business.status === 'error') return business;

  const brand = report(logger, 'intake', collectBrandProfile(store, inputs.brand));
  if (brand.status === 'error') return brand;

  const platforms = report(logger, 'intake', selectPlatforms(store, inputs.platforms));
  if (platforms.status === 'error') return platforms;

  const strategy = report(logger, 'strategy', buildStrategy(store));
  if (strategy.status === 'error') return strategy;

  const skipped = new Set(options.skipDays ?? []);
  const posts = report(
    logger,
    'daily posts',
    planDailyPosts(store, {
      seed,
      clock,
      weekStart,
      days: DAY_NUMBERS.filter((day) => !skipped.has(day)),
    })
  );
  if (posts.status === 'error') return posts;

  const calendar = report(logger, 'calendar', buildCalendar(store, { clock, weekStart }));
  if (calendar.status === 'error') return calendar;
  if (calendar.data.placeholderDays.length > 0) {
    logger.warn('Filled missing days with placeholder posts', {
      days: calendar.data.placeholderDays,
    });
  }

  const hashtags: HashtagRecommendation[] = [];
  for (const day of DAY_NUMBERS) {
    const recommendation = recommendHashtags(store, { day, brandedTags: options.brandedTags });
    if (recommendation.status === 'error') return report(logger, 'hashtags', recommendation);
    logger.debug(recommendation.message);
    if (recommendation.data.optimization.removed.length > 0) {
      logger.debug(`Removed ${recommendation.data.optimization.removed.join(', ')} for Day ${day}`);
    }

    hashtags.push(recommendation.data);
  }

  const visuals = report(
    logger,
    'visuals',
    analyzeBrandVisuals(store, { brandColors: options.brandColors })
  );
  if (visuals.status === 'error') return visuals;

  const visualConcepts: VisualConcept[] = [];
  for (const day of DAY_NUMBERS) {
    const concept = generateVisualConcept(store, { day });
    if (concept.status === 'error') return report(logger, 'visuals', concept);
    logger.debug(concept.message);
    visualConcepts.push(concept.data);
  }

  const summary = report(logger, 'summary', generateSummary(store));
  if (summary.status === 'error') return summary;

  return success('Weekly content plan completed', {
    store,
    platformGuidance: platforms.data.guidance,
    strategy: strategy.data,
    calendar: calendar.data,
    hashtags,
    visuals: visuals.data,
    visualConcepts,
    summary: summary.data,
  });
}
