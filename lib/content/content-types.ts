import { lookupBySubstring, matchFirst } from '@/lib/rules';
import { dayName, isDayNumber, type DayNumber } from '@/lib/planner';
import {
  ValidationError,
  contentTypesKey,
  mapResult,
  runStage,
  type ContextStore,
  type StageResult,
} from '@/lib/pipeline';
import { PlatformSchema, type Platform } from '@/lib/intake';
import type { GoalPriority, StrategyFramework } from '@/lib/strategy';
import type { ContentTypePools, ContentTypeRecommendation, ContentTypeRequest } from './types';
import {
  AGE_GROUP_RULES,
  AGE_PREFERENCES,
  AUDIENCE_PREFERENCES,
  AUDIENCE_TYPE_RULES,
  DEFAULT_ENGAGEMENT_POTENTIAL,
  DEFAULT_INDUSTRY_TREND,
  DEFAULT_RATIONALE,
  ENGAGEMENT_POTENTIAL,
  GENERIC_GOAL_PREFERENCES,
  GOAL_PREFERENCES,
  INDUSTRY_ALIASES,
  INDUSTRY_TRENDS,
  MAX_RECOMMENDATIONS,
  OPTIMAL_TIMING,
  PLATFORM_TRENDS,
  RATIONALES,
} from './tables';

function uniqueInOrder(values: readonly string[]): string[] {
  return [...new Set(values)];
}

export function industryTrendsFor(industry: string): string[] {
  const key = lookupBySubstring(industry, INDUSTRY_ALIASES) ?? DEFAULT_INDUSTRY_TREND;
  return [...INDUSTRY_TRENDS[key]];
}

/**
 * Preferences for each goal priority, in priority order, without repeats
 */
export function goalPreferencesFor(priorities: readonly GoalPriority[]): string[] {
  if (priorities.length === 0) {
    return [...GENERIC_GOAL_PREFERENCES];
  }
  return uniqueInOrder(priorities.flatMap((priority) => GOAL_PREFERENCES[priority]));
}

export function audiencePreferencesFor(audience: string): string[] {
  const audienceType = matchFirst(audience, AUDIENCE_TYPE_RULES, 'professional');
  const ageGroup = matchFirst(audience, AGE_GROUP_RULES, 'mixed');
  return uniqueInOrder([...AUDIENCE_PREFERENCES[audienceType], ...AGE_PREFERENCES[ageGroup]]);
}

export function gatherContentTypePools(context: {
  industry: string;
  priorities: readonly GoalPriority[];
  audience: string;
  platform: Platform;
}): ContentTypePools {
  return {
    platformTrends: [...PLATFORM_TRENDS[context.platform]],
    industryTrends: industryTrendsFor(context.industry),
    goalPreferences: goalPreferencesFor(context.priorities),
    audiencePreferences: audiencePreferencesFor(context.audience),
  };
}

/**
 * Tally every type across the pools and keep the five most frequent.
 * Ties keep first-seen order (platform, industry, goal, audience).
 */
export function rankContentTypes(
  pools: ContentTypePools,
  context: { platform: Platform; dayName: string }
): ContentTypeRecommendation[] {
  const tally = new Map<string, number>();
  const ordered = [
    ...pools.platformTrends,
    ...pools.industryTrends,
    ...pools.goalPreferences,
    ...pools.audiencePreferences,
  ];

  for (const contentType of ordered) {
    tally.set(contentType, (tally.get(contentType) ?? 0) + 1);
  }

  return [...tally.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, MAX_RECOMMENDATIONS)
    .map(([contentType, count]) => ({
      contentType,
      confidenceScore: count,
      rationale: RATIONALES[contentType] ?? DEFAULT_RATIONALE,
      optimalTiming:
        OPTIMAL_TIMING[contentType] ?? `Optimal for ${context.platform} on ${context.dayName}`,
      engagementPotential: ENGAGEMENT_POTENTIAL[contentType] ?? DEFAULT_ENGAGEMENT_POTENTIAL,
    }));
}

/**
 * Validate the day and that the platform belongs to the strategy's selection
 */
export function resolveDayAndPlatform(
  day: number,
  platform: string,
  strategy: StrategyFramework
): { day: DayNumber; platform: Platform } {
  if (!isDayNumber(day)) {
    throw new ValidationError('day out of range', [`day: expected 1-7, got ${day}`]);
  }

  const parsed = PlatformSchema.safeParse(platform);
  if (!parsed.success) {
    throw new ValidationError(`Unknown platform: ${platform}`, [
      `platform: expected Facebook, Instagram or LinkedIn, got ${platform}`,
    ]);
  }

  if (!strategy.platformStrategy.platforms.includes(parsed.data)) {
    throw new ValidationError(`Platform ${parsed.data} is not in the platform selection`, [
      `platform: ${parsed.data} is not one of ${strategy.platformStrategy.platforms.join(', ')}`,
    ]);
  }

  return { day, platform: parsed.data };
}

/**
 * Stage: requires business and strategy, writes `contentTypes:<day>`
 */
export function recommendContentTypes(
  store: ContextStore,
  request: ContentTypeRequest
): StageResult<ContentTypeRecommendation[]> {
  const result = runStage(store, {
    name: 'content-types',
    requires: ['business', 'strategy'],
    compute: (source) => {
      const business = source.require('business');
      const strategy = source.require('strategy');
      const { day, platform } = resolveDayAndPlatform(request.day, request.platform, strategy);

      const pools = gatherContentTypePools({
        industry: business.industry,
        priorities: strategy.businessAnalysis.goalsAnalysis.contentPriorities,
        audience: business.targetAudience,
        platform,
      });
      return { day, recommendations: rankContentTypes(pools, { platform, dayName: dayName(day) }) };
    },
    commit: (target, { day, recommendations }) =>
      target.set(contentTypesKey(day), recommendations),
    describe: ({ recommendations }) =>
      `Content type optimization completed with ${recommendations.length} recommendations`,
  });

  return mapResult(result, ({ recommendations }) => recommendations);
}
