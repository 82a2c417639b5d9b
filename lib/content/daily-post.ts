import { z } from 'zod';
import { matchFirst } from '@/lib/rules';
import {
  DAY_NUMBERS,
  createSeededRandom,
  dayName,
  deriveDaySeed,
  scheduledDateFor,
  weekStartFor,
  type Clock,
  type DayNumber,
  type RandomSource,
} from '@/lib/planner';
import {
  failure,
  postKey,
  precondition,
  runStage,
  success,
  type ContextStore,
  type StageResult,
} from '@/lib/pipeline';
import {
  parseInput,
  requiredText,
  type BrandProfile,
  type BusinessProfile,
  type Platform,
} from '@/lib/intake';
import type { FocusArea, StrategyFramework } from '@/lib/strategy';
import type { DailyPost, DailyPostRequest } from './types';
import { recommendContentTypes, resolveDayAndPlatform } from './content-types';
import {
  BODY_TEMPLATES,
  CTA_TEMPLATES,
  DEFAULT_ACTION,
  DEFAULT_ADJECTIVE,
  DEFAULT_BODY,
  DEFAULT_GOAL,
  DEFAULT_HOOKS,
  FOCUS_GOALS,
  HOOK_TEMPLATES,
  PLATFORM_OPTIMIZATION,
  THEME_ACTIONS,
  THEME_GOALS,
  TITLE_TEMPLATES,
  VOICE_ADJECTIVES,
  type TemplateContext,
} from './templates';

const DailyPostRequestSchema = z.object({
  day: z.number({ required_error: 'day is required', invalid_type_error: 'day must be a number' }),
  theme: requiredText('theme'),
  postType: requiredText('postType'),
  platform: requiredText('platform'),
  audience: requiredText('audience').optional(),
  voice: requiredText('voice').optional(),
});

export interface DailyPostOptions {
  random: RandomSource;
  clock?: Clock;
  /** Any date in the planned week; defaults to the clock's week */
  weekStart?: Date;
}

export interface AssembleInput {
  day: DayNumber;
  theme: string;
  postType: string;
  platform: Platform;
  audience: string;
  voice: string;
}

export interface AssembleContext {
  business: BusinessProfile;
  brand: BrandProfile;
  strategy: StrategyFramework;
  random: RandomSource;
  now: Date;
  weekStart: Date;
}

function firstSegment(text: string): string {
  return text.split(',')[0].trim();
}

/**
 * Theme override first, then the weekday's focus area
 */
export function resolveGoal(theme: string, focus?: FocusArea): string {
  return matchFirst(theme, THEME_GOALS, focus ? FOCUS_GOALS[focus] : DEFAULT_GOAL);
}

export function formatCaption(caption: string, platform: Platform): string {
  if (platform === 'Instagram') {
    return caption.replaceAll('. ', '.\n\n');
  }
  return caption;
}

export function buildTemplateContext(
  input: Pick<AssembleInput, 'theme' | 'audience' | 'voice'>,
  business: BusinessProfile,
  brand: BrandProfile
): TemplateContext {
  return {
    theme: input.theme,
    industry: business.industry,
    audience: input.audience,
    audienceLead: firstSegment(input.audience),
    adjective: matchFirst(input.voice, VOICE_ADJECTIVES, DEFAULT_ADJECTIVE),
    action: THEME_ACTIONS[input.theme] ?? DEFAULT_ACTION,
    problem: firstSegment(business.currentChallenges).toLowerCase(),
    coreValues: brand.coreValues,
    challenges: business.currentChallenges,
  };
}

/**
 * Build one post from templates. Draws title, hook, then call-to-action from the
 * random source, so a fixed seed reproduces the post exactly.
 */
export function assembleDailyPost(input: AssembleInput, context: AssembleContext): DailyPost {
  const { business, brand, strategy, random } = context;
  const name = dayName(input.day);
  const templateContext = buildTemplateContext(input, business, brand);

  const title = random.choice(TITLE_TEMPLATES[input.platform])(templateContext);
  const hook = random.choice(HOOK_TEMPLATES[input.theme] ?? DEFAULT_HOOKS)(templateContext);
  const body = (BODY_TEMPLATES[input.theme] ?? DEFAULT_BODY)(templateContext);
  const cta = random.choice(CTA_TEMPLATES[input.platform]);

  return {
    day: input.day,
    dayName: name,
    platform: input.platform,
    goal: resolveGoal(input.theme, strategy.weeklyStructure[name].focusArea),
    postType: input.postType,
    title,
    caption: formatCaption([hook, body, cta].join('\n\n'), input.platform),
    contentTheme: input.theme,
    platformOptimization: { ...PLATFORM_OPTIMIZATION[input.platform] },
    brandAlignment: {
      voice: brand.voice,
      tone: brand.tone,
      values: brand.coreValues,
    },
    targetAudience: input.audience,
    scheduledDate: scheduledDateFor(context.weekStart, input.day),
    timestamp: context.now.toISOString(),
  };
}

/**
 * Stage: requires business, brand, platforms and strategy, writes `post:<day>`
 */
export function generateDailyPost(
  store: ContextStore,
  request: DailyPostRequest,
  options: DailyPostOptions
): StageResult<DailyPost> {
  const clock = options.clock ?? (() => new Date());

  return runStage(store, {
    name: 'daily-post',
    requires: ['business', 'brand', 'platforms', 'strategy'],
    compute: (source) => {
      const business = source.require('business');
      const brand = source.require('brand');
      const strategy = source.require('strategy');
      const parsed = parseInput(DailyPostRequestSchema, request, 'daily post request');
      const { day, platform } = resolveDayAndPlatform(parsed.day, parsed.platform, strategy);
      const now = clock();

      return assembleDailyPost(
        {
          day,
          platform,
          theme: parsed.theme,
          postType: parsed.postType,
          audience: parsed.audience ?? business.targetAudience,
          voice: parsed.voice ?? brand.voice,
        },
        {
          business,
          brand,
          strategy,
          random: options.random,
          now,
          weekStart: options.weekStart ?? weekStartFor(now),
        }
      );
    },
    commit: (target, post) => target.set(postKey(post.day), post),
    describe: (post) => `Post generated successfully for Day ${post.day}`,
  });
}

export interface PlanDailyPostsOptions {
  seed: number | string;
  clock?: Clock;
  weekStart?: Date;
  /** Days to generate; defaults to the whole week */
  days?: readonly DayNumber[];
}

/**
 * Platform for a day: the selection is cycled across the week
 */
export function platformForDay(platforms: readonly Platform[], day: DayNumber): Platform {
  return platforms[(day - 1) % platforms.length];
}

/**
 * First recommended content type the platform allows, else its first post type
 */
export function choosePostType(recommended: readonly string[], allowed: readonly string[]): string {
  return recommended.find((type) => allowed.includes(type)) ?? allowed[0] ?? 'Image Post';
}

/**
 * Generate posts for the requested days from the strategy's weekly structure.
 * Each day draws from its own seeded stream, so days do not affect each other.
 */
export function planDailyPosts(
  store: ContextStore,
  options: PlanDailyPostsOptions
): StageResult<DailyPost[]> {
  const gate = precondition(store, ['business', 'brand', 'platforms', 'strategy']);
  if (!gate.ok) {
    return failure(gate.error);
  }

  const strategy = store.require('strategy');
  const { platforms, postTypes } = strategy.platformStrategy;
  const posts: DailyPost[] = [];

  for (const day of options.days ?? DAY_NUMBERS) {
    const platform = platformForDay(platforms, day);
    const recommendations = recommendContentTypes(store, { day, platform });
    if (recommendations.status === 'error') {
      return recommendations;
    }

    const post = generateDailyPost(
      store,
      {
        day,
        platform,
        theme: strategy.weeklyStructure[dayName(day)].theme,
        postType: choosePostType(
          recommendations.data.map((recommendation) => recommendation.contentType),
          postTypes[platform] ?? []
        ),
      },
      {
        random: createSeededRandom(deriveDaySeed(options.seed, day)),
        clock: options.clock,
        weekStart: options.weekStart,
      }
    );
    if (post.status === 'error') {
      return post;
    }
    posts.push(post.data);
  }

  return success(`Generated ${posts.length} daily posts`, posts);
}
