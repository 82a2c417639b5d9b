import { z } from 'zod';
import { lookupBySubstring, matchFirst, type KeywordRuleTable } from '@/lib/rules';
import { isDayNumber } from '@/lib/planner';
import {
  ValidationError,
  hashtagsKey,
  runStage,
  type ContextStore,
  type StageResult,
} from '@/lib/pipeline';
import { parseInput, type Platform } from '@/lib/intake';
import type { DailyPost } from '@/lib/content';
import type {
  HashtagCandidate,
  HashtagCategory,
  HashtagRecommendation,
  HashtagRequest,
  HashtagWindow,
  SelectionGroup,
} from './types';
import { HASHTAG_POOLS, type HashtagAudienceType, type HashtagPools, type TieredTags } from './pools';
import { dedupeTags, extractContentKeywords, scoreHashtag, toHashtag } from './keywords';
import { PLATFORM_GUIDELINES } from './guidelines';
import { optimizeHashtagsForPost } from './optimize';

const AUDIENCE_RULES: KeywordRuleTable<HashtagAudienceType> = [
  { category: 'professional', keywords: ['professional', 'business', 'executive'] },
  { category: 'entrepreneur', keywords: ['entrepreneur', 'startup', 'small business'] },
  { category: 'student', keywords: ['student', 'learner', 'education'] },
];

const QUOTA_SHARES: Record<SelectionGroup, number> = {
  popular: 0.3,
  niche: 0.5,
  branded: 0.1,
  content: 0.1,
};

const SELECTION_ORDER: readonly SelectionGroup[] = ['popular', 'niche', 'branded', 'content'];

// Only the strongest keywords become content tags
const MAX_CONTENT_TAGS = 10;

const BrandedTagsSchema = z
  .array(
    z
      .string()
      .trim()
      .refine((tag) => tag.replaceAll('#', '').trim().length > 0, 'branded tags must not be empty')
  )
  .default([])
  .transform((tags) => tags.map(toHashtag));

export interface HashtagResearchInput {
  post: Pick<DailyPost, 'title' | 'caption' | 'contentTheme' | 'goal' | 'platform'>;
  industry: string;
  audience: string;
  brandedTags?: readonly string[];
  pools?: HashtagPools;
}

export type HashtagResearch = Pick<
  HashtagRecommendation,
  'platform' | 'contentKeywords' | 'finalSet' | 'breakdown' | 'window'
>;

function candidates(
  tags: readonly string[],
  category: HashtagCategory,
  keywords: readonly string[]
): HashtagCandidate[] {
  return tags.map((tag) => ({ tag, category, score: scoreHashtag(tag, keywords) }));
}

/**
 * Stable sort by score, highest first
 */
export function rankCandidates(items: readonly HashtagCandidate[]): HashtagCandidate[] {
  return [...items].sort((a, b) => b.score - a.score);
}

/**
 * Per-group quotas of the platform maximum; a group with candidates gets at least one
 */
export function allocateQuotas(
  max: number,
  available: Record<SelectionGroup, number>
): Record<SelectionGroup, number> {
  const quota = (group: SelectionGroup) =>
    available[group] === 0 ? 0 : Math.max(1, Math.round(QUOTA_SHARES[group] * max));

  return {
    popular: quota('popular'),
    niche: quota('niche'),
    branded: quota('branded'),
    content: quota('content'),
  };
}

export function classifyAudience(audience: string): HashtagAudienceType {
  return matchFirst(audience, AUDIENCE_RULES, 'general');
}

/**
 * Candidate groups for one post, each deduplicated in first-seen order
 */
export function gatherCandidateGroups(
  input: HashtagResearchInput,
  keywords: readonly string[]
): Record<SelectionGroup, HashtagCandidate[]> {
  const pools = input.pools ?? HASHTAG_POOLS;
  const platform: Platform = input.post.platform;
  const industryTrending =
    lookupBySubstring(input.industry, pools.industryTrending) ?? pools.defaultIndustryTrending;
  const industry: TieredTags =
    lookupBySubstring(input.industry, pools.industry) ?? pools.defaultIndustry;
  const audience = pools.audience[classifyAudience(input.audience)];
  const tagOf = (candidate: HashtagCandidate) => candidate.tag;

  return {
    popular: dedupeTags(
      [
        ...candidates(pools.generalTrending, 'trending', keywords),
        ...candidates(industryTrending, 'trending', keywords),
        ...candidates(pools.platformTrending[platform], 'trending', keywords),
        ...candidates(pools.platformRecommended[platform], 'platform', keywords),
        ...candidates(industry.primary, 'industry', keywords),
        ...candidates(audience.primary, 'audience', keywords),
      ],
      tagOf
    ),
    niche: dedupeTags(
      [
        ...candidates(industry.niche, 'industry', keywords),
        ...candidates(audience.niche, 'audience', keywords),
        ...candidates(industry.secondary, 'industry', keywords),
        ...candidates(audience.secondary, 'audience', keywords),
      ],
      tagOf
    ),
    branded: dedupeTags(candidates(input.brandedTags ?? [], 'branded', keywords), tagOf),
    content: candidates(
      keywords.slice(0, MAX_CONTENT_TAGS).map((keyword) => `#${keyword}`),
      'content',
      keywords
    ),
  };
}

/**
 * Select, union, deduplicate and re-rank; backfill to the platform minimum
 */
export function selectHashtags(
  groups: Record<SelectionGroup, HashtagCandidate[]>,
  window: HashtagWindow
): { finalSet: string[]; breakdown: Record<SelectionGroup, string[]> } {
  const quotas = allocateQuotas(window.max, {
    popular: groups.popular.length,
    niche: groups.niche.length,
    branded: groups.branded.length,
    content: groups.content.length,
  });

  const selected: Record<SelectionGroup, HashtagCandidate[]> = {
    popular: rankCandidates(groups.popular).slice(0, quotas.popular),
    niche: rankCandidates(groups.niche).slice(0, quotas.niche),
    branded: rankCandidates(groups.branded).slice(0, quotas.branded),
    content: rankCandidates(groups.content).slice(0, quotas.content),
  };

  const tagOf = (candidate: HashtagCandidate) => candidate.tag;
  const union = dedupeTags(
    SELECTION_ORDER.flatMap((group) => selected[group]),
    tagOf
  );
  let chosen = rankCandidates(union).slice(0, window.max);

  if (chosen.length < window.min) {
    const taken = new Set(chosen.map((candidate) => candidate.tag.toLowerCase()));
    const remaining = rankCandidates(
      dedupeTags(
        SELECTION_ORDER.flatMap((group) => groups[group]),
        tagOf
      ).filter((candidate) => !taken.has(candidate.tag.toLowerCase()))
    );
    chosen = rankCandidates([...chosen, ...remaining.slice(0, window.min - chosen.length)]);
  }

  return {
    finalSet: chosen.map(tagOf),
    breakdown: {
      popular: selected.popular.map(tagOf),
      niche: selected.niche.map(tagOf),
      branded: selected.branded.map(tagOf),
      content: selected.content.map(tagOf),
    },
  };
}

/**
 * Research a hashtag set for one post
 */
export function researchHashtags(input: HashtagResearchInput): HashtagResearch {
  const { post } = input;
  const window = { ...PLATFORM_GUIDELINES[post.platform].window };
  const contentKeywords = extractContentKeywords([
    post.title,
    post.caption,
    post.contentTheme,
    post.goal,
  ]);
  const groups = gatherCandidateGroups(input, contentKeywords);

  return {
    platform: post.platform,
    contentKeywords,
    ...selectHashtags(groups, window),
    window,
  };
}

/**
 * Stage: requires business and calendar, writes `hashtags:<day>`
 *
 * The researched set goes through the platform optimizer before it is stored,
 * so `finalSet` and `compliance` describe what gets published.
 */
export function recommendHashtags(
  store: ContextStore,
  request: HashtagRequest
): StageResult<HashtagRecommendation> {
  return runStage(store, {
    name: 'hashtags',
    requires: ['business', 'calendar'],
    compute: (source) => {
      const { day } = request;
      if (!isDayNumber(day)) {
        throw new ValidationError('day out of range', [`day: expected 1-7, got ${day}`]);
      }

      const business = source.require('business');
      const post = source.require('calendar').dailyPosts[day - 1];
      const brandedTags = parseInput(BrandedTagsSchema, request.brandedTags, 'branded tags');
      const research = researchHashtags({
        post,
        industry: business.industry,
        audience: business.targetAudience,
        brandedTags,
      });

      const optimized = optimizeHashtagsForPost(research, post, business.industry);

      return {
        day,
        platform: research.platform,
        contentKeywords: research.contentKeywords,
        researchedSet: research.finalSet,
        finalSet: optimized.hashtags,
        breakdown: research.breakdown,
        window: research.window,
        optimization: {
          contentType: optimized.contentType,
          removed: optimized.removed,
          backfilled: optimized.backfilled,
          window: optimized.window,
          underfilled: optimized.underfilled,
        },
        compliance: optimized.compliance,
      };
    },
    commit: (target, recommendation) =>
      target.set(hashtagsKey(recommendation.day), recommendation),
    describe: (recommendation) =>
      `Hashtag research completed with ${recommendation.finalSet.length} hashtags for Day ${recommendation.day}`,
  });
}
