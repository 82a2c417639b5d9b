import type { ZodType, ZodTypeDef } from 'zod';
import { ContextStore, ValidationError, runStage, type StageResult } from '@/lib/pipeline';
import {
  BrandProfileSchema,
  BusinessProfileSchema,
  PlatformSelectionSchema,
  type BrandProfile,
  type BusinessProfile,
  type Platform,
  type PlatformSelectionResult,
} from './types';

const PLATFORM_GUIDANCE: Record<Platform, string> = {
  Facebook:
    'Focus on community building, longer-form content, and video content. Optimal posting times: 9 AM - 3 PM',
  Instagram:
    'Emphasize visual storytelling, stories, reels, and high-quality imagery. Optimal posting times: 11 AM - 1 PM, 5 PM - 7 PM',
  LinkedIn:
    'Professional content, thought leadership, industry insights, and B2B networking. Optimal posting times: 8 AM - 10 AM, 12 PM - 2 PM',
};

/**
 * Validate raw input against a schema, converting zod issues to a ValidationError
 */
export function parseInput<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  label: string
): T {
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid ${label}: ${issues.join('; ')}`, issues);
  }

  return parsed.data;
}

/**
 * Validate and store the business profile
 */
export function collectBusinessProfile(
  store: ContextStore,
  input: unknown
): StageResult<BusinessProfile> {
  return runStage(store, {
    name: 'intake',
    requires: [],
    compute: () => Object.freeze(parseInput(BusinessProfileSchema, input, 'business profile')),
    commit: (target, profile) => target.set('business', profile),
    describe: () => 'Business information collected successfully',
  });
}

/**
 * Validate and store the brand personality
 */
export function collectBrandProfile(store: ContextStore, input: unknown): StageResult<BrandProfile> {
  return runStage(store, {
    name: 'intake',
    requires: [],
    compute: () => Object.freeze(parseInput(BrandProfileSchema, input, 'brand profile')),
    commit: (target, profile) => target.set('brand', profile),
    describe: () => 'Brand personality assessment completed successfully',
  });
}

/**
 * Validate and store the platform selection, with per-platform guidance
 */
export function selectPlatforms(
  store: ContextStore,
  input: unknown
): StageResult<PlatformSelectionResult> {
  return runStage(store, {
    name: 'intake',
    requires: [],
    compute: () => {
      const parsed = parseInput(PlatformSelectionSchema, input, 'platform selection');
      const selection = Object.freeze({
        platforms: Object.freeze([...parsed.platforms]),
        priorities: parsed.priorities,
      });
      const guidance: Partial<Record<Platform, string>> = {};
      for (const platform of selection.platforms) {
        guidance[platform] = PLATFORM_GUIDANCE[platform];
      }
      return { selection, guidance };
    },
    commit: (target, result) => target.set('platforms', result.selection),
    describe: (result) =>
      `Platform selection completed for ${result.selection.platforms.length} platform(s)`,
  });
}
