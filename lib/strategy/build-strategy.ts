import { containsAny, lookupBySubstring, matchAll } from '@/lib/rules';
import { WEEKDAYS, type DayName } from '@/lib/planner';
import { runStage, type ContextStore, type StageResult } from '@/lib/pipeline';
import type { BrandProfile, BusinessProfile, Platform, PlatformSelection } from '@/lib/intake';
import type {
  ChallengesAnalysis,
  ContentMixCategory,
  GoalsAnalysis,
  StrategyFramework,
  Theme,
  WeeklySlot,
  WeeklyStructure,
} from './types';
import {
  BASE_POST_TYPES,
  BASE_SUCCESS_METRICS,
  CASUAL_POST_TYPES,
  CHALLENGE_RULES,
  CONDITIONAL_METRIC_RULES,
  CONTENT_MIX,
  FOCUS_ROTATION,
  FORMAL_VOICE_KEYWORDS,
  GOAL_RULES,
  INDUSTRY_THEMES,
  MAX_THEMES,
  UNIVERSAL_THEMES,
} from './tables';

export function analyzeGoals(goals: string): GoalsAnalysis {
  const contentPriorities = matchAll(goals, GOAL_RULES);
  return {
    primaryGoals: goals,
    contentPriorities,
    focusAreas: contentPriorities.slice(0, 2),
  };
}

export function analyzeChallenges(challenges: string): ChallengesAnalysis {
  return {
    currentChallenges: challenges,
    contentSolutions: matchAll(challenges, CHALLENGE_RULES),
  };
}

/**
 * Universal themes plus at most one industry theme, capped at four
 */
export function selectThemes(industry: string): Theme[] {
  const themes = UNIVERSAL_THEMES.map((theme) => ({ ...theme }));
  const industryTheme = lookupBySubstring(industry, INDUSTRY_THEMES);
  if (industryTheme) {
    themes.push({ ...industryTheme });
  }
  return themes.slice(0, MAX_THEMES);
}

/**
 * Post types per selected platform; formal voices drop Story, Reel and Live
 */
export function recommendPostTypes(
  platforms: readonly Platform[],
  voice: string
): Partial<Record<Platform, string[]>> {
  const formal = containsAny(voice, FORMAL_VOICE_KEYWORDS);
  const postTypes: Partial<Record<Platform, string[]>> = {};

  for (const platform of platforms) {
    const base = BASE_POST_TYPES[platform];
    postTypes[platform] = formal ? base.filter((type) => !CASUAL_POST_TYPES.includes(type)) : [...base];
  }

  return postTypes;
}

/**
 * Assign themes and focus areas to weekdays cyclically
 */
export function buildWeeklyStructure(themes: readonly Theme[]): WeeklyStructure {
  if (themes.length === 0) {
    throw new RangeError('At least one theme is required to build a weekly structure');
  }

  const slotFor = (day: DayName): WeeklySlot => {
    const index = WEEKDAYS.indexOf(day);
    const theme = themes[index % themes.length];
    return {
      theme: theme.name,
      themeDescription: theme.description,
      focusArea: FOCUS_ROTATION[index % FOCUS_ROTATION.length],
    };
  };

  return {
    Monday: slotFor('Monday'),
    Tuesday: slotFor('Tuesday'),
    Wednesday: slotFor('Wednesday'),
    Thursday: slotFor('Thursday'),
    Friday: slotFor('Friday'),
    Saturday: slotFor('Saturday'),
    Sunday: slotFor('Sunday'),
  };
}

export function recommendContentMix(): Record<ContentMixCategory, number> {
  const mix = { ...CONTENT_MIX };
  const total = Object.values(mix).reduce((sum, value) => sum + value, 0);
  if (total !== 100) {
    throw new Error(`Content mix must sum to 100, got ${total}`);
  }
  return mix;
}

export function defineSuccessMetrics(goals: string): string[] {
  return [...BASE_SUCCESS_METRICS, ...matchAll(goals, CONDITIONAL_METRIC_RULES)];
}

/**
 * Derive the strategy framework from the three intake records
 */
export function buildStrategyFramework(
  business: BusinessProfile,
  brand: BrandProfile,
  selection: PlatformSelection
): StrategyFramework {
  const themes = selectThemes(business.industry);

  return {
    businessAnalysis: {
      industry: business.industry,
      targetAudience: business.targetAudience,
      goalsAnalysis: analyzeGoals(business.businessGoals),
      challengesAnalysis: analyzeChallenges(business.currentChallenges),
    },
    brandAlignment: {
      voice: brand.voice,
      tone: brand.tone,
      values: brand.coreValues,
      personalityTraits: brand.personalityAdjectives,
    },
    platformStrategy: {
      platforms: [...selection.platforms],
      priorities: selection.priorities,
      postTypes: recommendPostTypes(selection.platforms, brand.voice),
    },
    themes,
    weeklyStructure: buildWeeklyStructure(themes),
    contentMix: recommendContentMix(),
    successMetrics: defineSuccessMetrics(business.businessGoals),
  };
}

/**
 * Stage: requires the intake artifacts, writes `strategy`
 */
export function buildStrategy(store: ContextStore): StageResult<StrategyFramework> {
  return runStage(store, {
    name: 'strategy',
    requires: ['business', 'brand', 'platforms'],
    compute: (source) =>
      buildStrategyFramework(
        source.require('business'),
        source.require('brand'),
        source.require('platforms')
      ),
    commit: (target, framework) => target.set('strategy', framework),
    describe: (framework) =>
      `Content strategy analysis completed with ${framework.themes.length} themes`,
  });
}
