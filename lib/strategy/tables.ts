import type { KeywordRuleTable } from '@/lib/rules';
import type { Platform } from '@/lib/intake';
import type {
  ChallengeSolution,
  ContentMixCategory,
  FocusArea,
  GoalPriority,
  Theme,
} from './types';

export const GOAL_RULES: KeywordRuleTable<GoalPriority> = [
  { category: 'brand_awareness', keywords: ['awareness', 'visibility', 'brand'] },
  { category: 'lead_generation', keywords: ['lead', 'generate', 'prospect'] },
  { category: 'engagement', keywords: ['engagement', 'community', 'interaction'] },
  { category: 'conversion', keywords: ['sales', 'conversion', 'revenue'] },
];

export const CHALLENGE_RULES: KeywordRuleTable<ChallengeSolution> = [
  { category: 'interactive_content', keywords: ['engagement', 'interaction', 'response'] },
  { category: 'audience_focused_content', keywords: ['audience', 'reach', 'visibility'] },
  { category: 'diverse_content_types', keywords: ['content', 'ideas', 'creativity'] },
];

export const UNIVERSAL_THEMES: readonly Theme[] = [
  {
    name: 'Educational Content',
    description: 'Share industry insights, tips, and knowledge to establish authority',
    alignment: 'Works for all industries and goals',
  },
  {
    name: 'Behind-the-Scenes',
    description: 'Show company culture, processes, and team to build trust',
    alignment: 'Great for brand awareness and engagement',
  },
  {
    name: 'Problem-Solution',
    description: 'Address customer pain points and showcase solutions',
    alignment: 'Perfect for lead generation and conversion',
  },
];

export const INDUSTRY_THEMES: readonly (readonly [string, Theme])[] = [
  [
    'technology',
    {
      name: 'Innovation & Trends',
      description: 'Share latest tech trends and innovations',
      alignment: 'Establishes thought leadership',
    },
  ],
  [
    'healthcare',
    {
      name: 'Health & Wellness',
      description: 'Educational health content and wellness tips',
      alignment: 'Builds trust and authority',
    },
  ],
  [
    'e-commerce',
    {
      name: 'Product Showcase',
      description: 'Highlight products and customer success stories',
      alignment: 'Drives sales and engagement',
    },
  ],
];

export const MAX_THEMES = 4;

export const BASE_POST_TYPES: Record<Platform, readonly string[]> = {
  Facebook: ['Image Post', 'Video', 'Link Share', 'Text Post', 'Carousel'],
  Instagram: ['Feed Post', 'Story', 'Reel', 'IGTV', 'Carousel', 'Live'],
  LinkedIn: ['Article', 'Image Post', 'Video', 'Text Post', 'Poll', 'Document Share'],
};

export const CASUAL_POST_TYPES: readonly string[] = ['Story', 'Reel', 'Live'];

export const FORMAL_VOICE_KEYWORDS: readonly string[] = ['professional', 'formal'];

export const FOCUS_ROTATION: readonly FocusArea[] = ['engagement', 'education', 'brand_awareness'];

// Fixed and industry-agnostic
export const CONTENT_MIX: Readonly<Record<ContentMixCategory, number>> = {
  educational: 40,
  promotional: 20,
  behind_scenes: 20,
  user_generated: 10,
  trending: 10,
};

export const BASE_SUCCESS_METRICS: readonly string[] = ['engagement_rate', 'reach', 'impressions'];

export const CONDITIONAL_METRIC_RULES: KeywordRuleTable<string> = [
  { category: 'lead_generation', keywords: ['lead'] },
  { category: 'conversion_rate', keywords: ['sales', 'conversion'] },
  { category: 'brand_mention_increase', keywords: ['awareness'] },
];
