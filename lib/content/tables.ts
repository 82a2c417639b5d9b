import type { KeywordRuleTable } from '@/lib/rules';
import type { Platform } from '@/lib/intake';
import type { GoalPriority } from '@/lib/strategy';

export const PLATFORM_TRENDS: Record<Platform, readonly string[]> = {
  Facebook: ['Video', 'Live Video', 'Carousel Posts', 'Story Highlights'],
  Instagram: ['Reels', 'Stories', 'Carousel Posts', 'IGTV'],
  LinkedIn: ['Articles', 'Video', 'Document Posts', 'Polls'],
};

export type IndustryTrendKey = 'technology' | 'healthcare' | 'e-commerce' | 'professional_services';

// Ordered; first alias found in the industry text wins
export const INDUSTRY_ALIASES: readonly (readonly [string, IndustryTrendKey])[] = [
  ['technology', 'technology'],
  ['tech', 'technology'],
  ['software', 'technology'],
  ['healthcare', 'healthcare'],
  ['health', 'healthcare'],
  ['medical', 'healthcare'],
  ['e-commerce', 'e-commerce'],
  ['retail', 'e-commerce'],
  ['online store', 'e-commerce'],
  ['consulting', 'professional_services'],
  ['services', 'professional_services'],
  ['professional', 'professional_services'],
];

export const DEFAULT_INDUSTRY_TREND: IndustryTrendKey = 'professional_services';

export const INDUSTRY_TRENDS: Record<IndustryTrendKey, readonly string[]> = {
  technology: ['Product Demos', 'Tech Tips', 'Industry News', 'Behind-the-Scenes'],
  healthcare: ['Educational Content', 'Patient Stories', 'Health Tips', 'Professional Insights'],
  'e-commerce': ['Product Showcases', 'Customer Reviews', 'Lifestyle Content', 'Promotions'],
  professional_services: ['Case Studies', 'Industry Insights', 'Expert Tips', 'Client Success Stories'],
};

export const GOAL_PREFERENCES: Record<GoalPriority, readonly string[]> = {
  brand_awareness: ['Behind-the-Scenes', 'Video', 'User-Generated Content', 'Stories'],
  lead_generation: ['Case Studies', 'Educational Content', 'Webinars', 'Document Posts'],
  engagement: ['Polls', 'Interactive Posts', 'Questions', 'User-Generated Content'],
  conversion: ['Product Showcases', 'Customer Reviews', 'Promotions', 'Video'],
};

export const GENERIC_GOAL_PREFERENCES: readonly string[] = [
  'Educational Content',
  'Industry Insights',
  'Professional Tips',
  'Case Studies',
];

export type AudienceType = 'professional' | 'consumer' | 'educational';
export type AgeGroup = 'millennial' | 'mature' | 'mixed';

export const AUDIENCE_TYPE_RULES: KeywordRuleTable<AudienceType> = [
  { category: 'professional', keywords: ['professional', 'executive', 'business'] },
  { category: 'consumer', keywords: ['consumer', 'customer', 'shopper'] },
  { category: 'educational', keywords: ['student', 'learner', 'beginner'] },
];

export const AGE_GROUP_RULES: KeywordRuleTable<AgeGroup> = [
  { category: 'millennial', keywords: ['25-45', 'millennial', 'young'] },
  { category: 'mature', keywords: ['45+', 'senior', 'mature'] },
];

export const AUDIENCE_PREFERENCES: Record<AudienceType, readonly string[]> = {
  professional: ['Educational Content', 'Industry Insights', 'Case Studies', 'Expert Tips'],
  consumer: ['Product Showcases', 'Customer Reviews', 'Lifestyle Content', 'Promotions'],
  educational: ['How-To Guides', 'Tutorials', 'Tips and Tricks', 'Beginner-Friendly Content'],
};

export const AGE_PREFERENCES: Record<AgeGroup, readonly string[]> = {
  millennial: ['Visual Content', 'Interactive Posts', 'Behind-the-Scenes', 'User-Generated Content'],
  mature: ['Detailed Articles', 'Professional Content', 'Testimonials', 'Educational Content'],
  mixed: ['Varied Content Types', 'Multi-Format Posts', 'Accessible Content'],
};

export const RATIONALES: Readonly<Partial<Record<string, string>>> = {
  Video: 'High engagement rates across all platforms, especially effective for storytelling',
  'Educational Content': 'Establishes authority and provides value to audience',
  'Behind-the-Scenes': 'Builds trust and humanizes the brand',
  'User-Generated Content': 'Increases authenticity and community engagement',
  'Interactive Posts': 'Drives immediate engagement and feedback',
  'Product Showcases': 'Directly supports sales and conversion goals',
  'Industry Insights': 'Positions brand as thought leader and expert',
};

export const DEFAULT_RATIONALE = 'Aligned with current trends and audience preferences';

export const OPTIMAL_TIMING: Readonly<Partial<Record<string, string>>> = {
  Video: 'Tuesday-Thursday, peak hours for maximum reach',
  'Educational Content': 'Monday-Wednesday, when audience is most receptive to learning',
  'Interactive Posts': 'Friday-Sunday, when audience has more time to engage',
  Promotions: 'Tuesday-Thursday, mid-week for best conversion rates',
};

export const ENGAGEMENT_POTENTIAL: Readonly<Partial<Record<string, string>>> = {
  Video: 'High - typically 3-5x higher engagement than static content',
  'Interactive Posts': 'Very High - encourages immediate audience participation',
  'Educational Content': 'Medium-High - valuable content drives meaningful engagement',
  'Behind-the-Scenes': 'Medium - builds trust and authenticity',
  'User-Generated Content': 'High - leverages social proof and community',
};

export const DEFAULT_ENGAGEMENT_POTENTIAL = 'Medium - depends on execution and relevance';

export const MAX_RECOMMENDATIONS = 5;
