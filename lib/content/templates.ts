import type { KeywordRuleTable } from '@/lib/rules';
import type { Platform } from '@/lib/intake';
import type { FocusArea } from '@/lib/strategy';
import type { PlatformOptimization } from './types';

/** Values every template family may draw on */
export interface TemplateContext {
  theme: string;
  industry: string;
  /** First comma-separated segment of the audience */
  audienceLead: string;
  audience: string;
  /** Derived from the brand voice */
  adjective: string;
  /** Derived from the theme */
  action: string;
  /** First comma-separated segment of the challenges */
  problem: string;
  coreValues: string;
  challenges: string;
}

type Template = (ctx: TemplateContext) => string;

export const TITLE_TEMPLATES: Record<Platform, readonly Template[]> = {
  LinkedIn: [
    (ctx) => `How ${ctx.industry} Professionals Can ${ctx.action}`,
    (ctx) => `The ${ctx.adjective} Guide to ${ctx.theme}`,
    (ctx) => `Why ${ctx.audienceLead} Need to Know About ${ctx.theme}`,
  ],
  Instagram: [
    (ctx) => `✨ ${ctx.theme}: What You Need to Know`,
    (ctx) => `Behind the Scenes: ${ctx.theme} Edition`,
    (ctx) => `The ${ctx.adjective} Way to ${ctx.theme}`,
  ],
  Facebook: [
    (ctx) => `Let's Talk About ${ctx.theme}`,
    (ctx) => `Your ${ctx.theme} Questions Answered`,
    (ctx) => `The Truth About ${ctx.theme} for ${ctx.audienceLead}`,
  ],
};

export const DEFAULT_HOOKS: readonly Template[] = [
  () => 'Did you know that...',
  () => "Here's something most people don't realize...",
  () => 'Quick question for you...',
];

export const HOOK_TEMPLATES: Readonly<Partial<Record<string, readonly Template[]>>> = {
  'Educational Content': DEFAULT_HOOKS,
  'Behind-the-Scenes': [
    () => 'Ever wondered what goes on behind the scenes?',
    () => "Today we're pulling back the curtain...",
    () => "Here's what a typical day looks like...",
  ],
  'Problem-Solution': [
    (ctx) => `Struggling with ${ctx.problem}? You're not alone.`,
    () => 'We hear this challenge all the time...',
    (ctx) => `If you're dealing with ${ctx.problem}, this is for you.`,
  ],
};

export const BODY_TEMPLATES: Readonly<Partial<Record<string, Template>>> = {
  'Educational Content': (ctx) =>
    `As ${ctx.industry} professionals, it's crucial to stay informed about industry trends and best practices. Here are three key insights that can help ${ctx.audience} stay ahead of the curve.`,
  'Behind-the-Scenes': (ctx) =>
    `At our company, we believe in ${ctx.coreValues}. Today, we're sharing a glimpse into our process and the people who make it all possible.`,
  'Problem-Solution': (ctx) =>
    `We understand that ${ctx.challenges} can be challenging. That's why we've developed solutions specifically designed for ${ctx.audience}.`,
};

export const DEFAULT_BODY: Template = (ctx) =>
  `Our approach is rooted in ${ctx.coreValues}, ensuring we deliver value to ${ctx.audience}.`;

export const CTA_TEMPLATES: Record<Platform, readonly string[]> = {
  LinkedIn: [
    'What are your thoughts on this? Share your experience in the comments below.',
    "Have you faced similar challenges? Let's discuss in the comments.",
    "I'd love to hear your perspective on this topic.",
  ],
  Instagram: [
    'Double tap if you agree! 👆',
    "What's your take on this? Let us know below! 👇",
    'Tag someone who needs to see this! 👥',
  ],
  Facebook: [
    'What do you think? Share your thoughts below!',
    'Have you experienced this? Tell us your story!',
    "We'd love to hear from you - comment below!",
  ],
};

export const THEME_ACTIONS: Readonly<Partial<Record<string, string>>> = {
  'Educational Content': 'Stay Informed',
  'Behind-the-Scenes': 'See the Process',
  'Problem-Solution': 'Solve Problems',
};

export const DEFAULT_ACTION = 'Stay Ahead';

export const VOICE_ADJECTIVES: KeywordRuleTable<string> = [
  { category: 'Professional', keywords: ['professional'] },
  { category: 'Casual', keywords: ['casual'] },
  { category: 'Playful', keywords: ['playful'] },
];

export const DEFAULT_ADJECTIVE = 'Effective';

// Theme overrides take precedence over the weekday focus
export const THEME_GOALS: KeywordRuleTable<string> = [
  {
    category: 'Educate audience about industry topics and establish thought leadership',
    keywords: ['Educational'],
  },
  {
    category: 'Build trust and humanize the brand through authentic content',
    keywords: ['Behind-the-Scenes'],
  },
  {
    category: 'Address customer pain points and showcase solution value',
    keywords: ['Problem-Solution'],
  },
];

export const FOCUS_GOALS: Record<FocusArea, string> = {
  engagement: 'Increase audience engagement and interaction',
  education: 'Educate audience about industry topics and solutions',
  brand_awareness: 'Build brand visibility and recognition',
};

export const DEFAULT_GOAL = 'Increase audience engagement and interaction';

export const PLATFORM_OPTIMIZATION: Record<Platform, PlatformOptimization> = {
  Facebook: {
    bestPostingTimes: '9 AM - 3 PM',
    optimalLength: '40-80 characters for titles',
    engagementTips: 'Ask questions, share relatable content',
    visualRecommendations: 'High-quality images, 1200x630px for link previews',
  },
  Instagram: {
    bestPostingTimes: '11 AM - 1 PM, 5 PM - 7 PM',
    optimalLength: '125 characters for captions',
    engagementTips: 'Use Stories, engage with comments quickly',
    visualRecommendations: 'Square images 1080x1080px, high contrast',
  },
  LinkedIn: {
    bestPostingTimes: '8 AM - 10 AM, 12 PM - 2 PM',
    optimalLength: '150-300 characters for optimal engagement',
    engagementTips: 'Share professional insights, comment thoughtfully',
    visualRecommendations: 'Professional images, 1200x627px for articles',
  },
};
