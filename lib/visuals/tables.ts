import type { KeywordRuleTable } from '@/lib/rules';
import type { Platform } from '@/lib/intake';
import type {
  AgeGroup,
  BrandPalette,
  EmotionalTone,
  IndustryVisualStandards,
  ThemeDesign,
  ValueVisuals,
  VisualAudienceType,
  VisualElement,
  VisualPersonality,
} from './types';

// ============================================
// Brand Personality
// ============================================

export const PERSONALITY_RULES: KeywordRuleTable<VisualPersonality> = [
  {
    category: 'professional_authority',
    keywords: ['professional', 'authoritative', 'expert', 'formal'],
  },
  { category: 'friendly_approachable', keywords: ['friendly', 'approachable', 'casual', 'welcoming'] },
  {
    category: 'innovative_modern',
    keywords: ['innovative', 'cutting-edge', 'modern', 'forward-thinking'],
  },
  { category: 'playful_energetic', keywords: ['playful', 'energetic', 'fun', 'dynamic'] },
  { category: 'trustworthy_reliable', keywords: ['trustworthy', 'reliable', 'consistent', 'stable'] },
];

export const PERSONALITY_PRINCIPLES: Record<VisualPersonality, readonly string[]> = {
  professional_authority: [
    'Use clean, organized layouts with clear hierarchy',
    'Maintain consistent, professional typography',
    'Employ high-quality, business-appropriate imagery',
    'Use conservative color palettes with strategic accent colors',
  ],
  friendly_approachable: [
    'Use rounded, soft design elements',
    'Incorporate warm, inviting color schemes',
    'Include people-focused imagery and testimonials',
    'Maintain open, welcoming layouts with generous white space',
  ],
  innovative_modern: [
    'Embrace cutting-edge design trends and modern aesthetics',
    'Use bold, contemporary typography and layouts',
    'Incorporate dynamic visual elements and creative compositions',
    'Employ fresh, vibrant color palettes',
  ],
  playful_energetic: [
    'Use dynamic, movement-oriented design elements',
    'Incorporate bright, energetic color schemes',
    'Include fun, engaging imagery and interactive elements',
    'Maintain lively, energetic layouts with visual interest',
  ],
  trustworthy_reliable: [
    'Use stable, balanced compositions',
    'Employ consistent, reliable design patterns',
    'Incorporate authentic, credible imagery',
    'Maintain conservative, dependable color choices',
  ],
  balanced_versatile: [
    'Create adaptable designs that work across contexts',
    'Use flexible, versatile design elements',
    'Maintain professional appearance with personality touches',
    'Employ balanced color palettes with strategic accents',
  ],
};

export const VALUE_VISUALS: readonly (readonly [string, ValueVisuals])[] = [
  [
    'innovation',
    {
      characteristics: ['Modern design elements', 'Forward-thinking layouts', 'Creative compositions'],
      colors: ['Blue (trust)', 'Purple (creativity)', 'Silver (innovation)'],
      typography: ['Modern sans-serif', 'Clean lines', 'Contemporary feel'],
    },
  ],
  [
    'quality',
    {
      characteristics: ['High-resolution imagery', 'Premium feel', 'Attention to detail'],
      colors: ['Gold (premium)', 'Deep blue (reliability)', 'White (purity)'],
      typography: ['Refined fonts', 'Elegant spacing', 'Professional appearance'],
    },
  ],
  [
    'trust',
    {
      characteristics: ['Professional photography', 'Consistent branding', 'Authentic imagery'],
      colors: ['Blue (trust)', 'Green (stability)', 'Neutral tones'],
      typography: ['Readable fonts', 'Consistent hierarchy', 'Professional styling'],
    },
  ],
  [
    'customer-first',
    {
      characteristics: ['People-focused imagery', 'Customer testimonials', 'Service-oriented visuals'],
      colors: ['Warm colors', 'Approachable tones', 'Inviting palette'],
      typography: ['Friendly fonts', 'Approachable styling', 'Readable design'],
    },
  ],
  [
    'transparency',
    {
      characteristics: ['Clean layouts', 'Honest imagery', 'Straightforward design'],
      colors: ['Clear whites', 'Honest blues', 'Transparent elements'],
      typography: ['Clear fonts', 'Open spacing', 'Honest presentation'],
    },
  ],
  [
    'sustainability',
    {
      characteristics: ['Natural imagery', 'Eco-friendly elements', 'Organic shapes'],
      colors: ['Green tones', 'Natural colors', 'Earth tones'],
      typography: ['Organic fonts', 'Natural feel', 'Eco-conscious design'],
    },
  ],
];

export const GENERAL_VALUE_VISUALS: ValueVisuals = {
  characteristics: ['Professional appearance', 'Consistent branding', 'Quality imagery'],
  colors: ['Brand colors', 'Professional palette', 'Consistent tones'],
  typography: ['Readable fonts', 'Professional styling', 'Consistent hierarchy'],
};

export const EMOTIONAL_TONES: readonly (readonly [string, EmotionalTone])[] = [
  [
    'encouraging',
    {
      quality: 'Uplifting and motivating',
      characteristics: ['Bright colors', 'Positive imagery', 'Inspiring compositions'],
      mood: 'Optimistic and forward-looking',
    },
  ],
  [
    'supportive',
    {
      quality: 'Warm and caring',
      characteristics: ['Warm colors', 'Approachable imagery', 'Comforting layouts'],
      mood: 'Welcoming and supportive',
    },
  ],
  [
    'confident',
    {
      quality: 'Strong and assured',
      characteristics: ['Bold colors', 'Strong compositions', 'Assertive imagery'],
      mood: 'Self-assured and powerful',
    },
  ],
  [
    'professional',
    {
      quality: 'Competent and reliable',
      characteristics: ['Clean design', 'Professional imagery', 'Organized layouts'],
      mood: 'Trustworthy and capable',
    },
  ],
  [
    'friendly',
    {
      quality: 'Approachable and warm',
      characteristics: ['Inviting colors', 'Friendly imagery', 'Welcoming layouts'],
      mood: 'Open and accessible',
    },
  ],
];

export const DEFAULT_EMOTIONAL_TONE: EmotionalTone = {
  quality: 'Balanced and versatile',
  characteristics: ['Neutral colors', 'Professional imagery', 'Clean layouts'],
  mood: 'Professional and approachable',
};

export const KEYWORD_SYNONYMS: Readonly<Partial<Record<string, readonly string[]>>> = {
  trustworthy: ['reliable', 'dependable'],
  innovative: ['creative', 'forward-thinking'],
  friendly: ['approachable', 'welcoming'],
  professional: ['polished', 'refined'],
  energetic: ['dynamic', 'vibrant'],
};

export const DEFAULT_PERSONALITY_KEYWORDS: readonly string[] = ['professional', 'reliable'];

export const MAX_PERSONALITY_KEYWORDS = 10;

// ============================================
// Industry and Audience
// ============================================

export const INDUSTRY_VISUALS: readonly (readonly [string, IndustryVisualStandards])[] = [
  [
    'technology',
    {
      style: 'Modern, clean, tech-forward',
      colors: ['Blue', 'White', 'Gray', 'Accent colors'],
      typography: 'Clean sans-serif, modern fonts',
      imagery: 'High-tech, innovative, professional',
      trends: ['Minimalism', 'Flat design', 'Clean layouts'],
      avoid: ['Outdated design patterns', 'Overly decorative elements'],
    },
  ],
  [
    'healthcare',
    {
      style: 'Clean, trustworthy, professional',
      colors: ['Blue', 'White', 'Green', 'Soft tones'],
      typography: 'Readable, professional fonts',
      imagery: 'Professional, caring, trustworthy',
      trends: ['Clean layouts', 'Professional photography', 'Trust-building design'],
      avoid: ['Overly flashy designs', 'Unprofessional imagery'],
    },
  ],
  [
    'e-commerce',
    {
      style: 'Product-focused, conversion-optimized',
      colors: ['Brand colors', 'High contrast', 'Call-to-action colors'],
      typography: 'Clear, readable, conversion-focused',
      imagery: 'High-quality product photos, lifestyle imagery',
      trends: ['Product showcases', 'Social proof', 'Clear CTAs'],
      avoid: ['Cluttered layouts', 'Poor product photography'],
    },
  ],
];

export const PROFESSIONAL_SERVICES_VISUALS: IndustryVisualStandards = {
  style: 'Professional, authoritative, trustworthy',
  colors: ['Blue', 'Gray', 'Professional tones'],
  typography: 'Professional, readable fonts',
  imagery: 'Professional, business-appropriate',
  trends: ['Clean layouts', 'Professional imagery', 'Trust-building elements'],
  avoid: ['Casual design elements', 'Unprofessional imagery'],
};

export const AGE_GROUP_RULES: KeywordRuleTable<AgeGroup> = [
  { category: 'Gen Z', keywords: ['18-25', 'gen z', 'young', 'student'] },
  { category: 'Millennial', keywords: ['25-40', 'millennial', 'young professional'] },
  { category: 'Gen X', keywords: ['40-60', 'gen x', 'mature', 'established'] },
  { category: 'Baby Boomer', keywords: ['60+', 'baby boomer', 'senior'] },
];

export const AUDIENCE_TYPE_RULES: KeywordRuleTable<VisualAudienceType> = [
  {
    category: 'Business Professional',
    keywords: ['business', 'professional', 'executive', 'corporate'],
  },
  { category: 'Consumer', keywords: ['consumer', 'customer', 'shopper', 'buyer'] },
  { category: 'Student/Educational', keywords: ['student', 'learner', 'education', 'academic'] },
  { category: 'Entrepreneur', keywords: ['entrepreneur', 'startup', 'small business'] },
];

export const AGE_GROUP_VISUALS: Record<
  AgeGroup,
  { visualStyle: readonly string[]; colorPreferences: readonly string[] }
> = {
  'Gen Z': {
    visualStyle: ['Bold', 'Vibrant', 'Authentic', 'Social media native'],
    colorPreferences: ['Bright colors', 'High contrast', 'Trending palettes'],
  },
  Millennial: {
    visualStyle: ['Modern', 'Clean', 'Balanced', 'Mobile-optimized'],
    colorPreferences: ['Balanced palettes', 'Brand colors', 'Professional tones'],
  },
  'Gen X': {
    visualStyle: ['Professional', 'Trustworthy', 'Clear', 'Detailed'],
    colorPreferences: ['Conservative colors', 'Professional tones', 'Subtle accents'],
  },
  'Baby Boomer': {
    visualStyle: ['Traditional', 'Clear', 'Readable', 'Professional'],
    colorPreferences: ['Conservative palettes', 'High contrast', 'Readable colors'],
  },
  Mixed: {
    visualStyle: ['Versatile', 'Accessible', 'Professional', 'Inclusive'],
    colorPreferences: ['Balanced palettes', 'Accessible colors', 'Professional tones'],
  },
};

export const AUDIENCE_TYPE_APPROACH: Record<VisualAudienceType, readonly string[]> = {
  'Business Professional': [
    'Professional imagery',
    'Clean layouts',
    'Business-appropriate design',
  ],
  Consumer: ['Lifestyle imagery', 'Product showcases', 'Relatable content'],
  'Student/Educational': [
    'Clear, educational layouts',
    'Step-by-step visuals',
    'Informative design',
  ],
  Entrepreneur: ['Motivational imagery', 'Success-focused design', 'Professional presentation'],
  General: ['Versatile design', 'Inclusive imagery', 'Accessible layouts'],
};

export const AGE_GROUP_CONSIDERATIONS: Readonly<Partial<Record<AgeGroup, readonly string[]>>> = {
  'Gen Z': [
    'Design for mobile-first experience',
    'Use bold, attention-grabbing visuals',
    'Incorporate social media native elements',
    'Ensure fast loading and snappy interactions',
  ],
  Millennial: [
    'Balance professional and approachable design',
    'Optimize for mobile and desktop viewing',
    'Use modern, clean aesthetic',
    'Ensure easy sharing and engagement',
  ],
  'Gen X': [
    'Prioritize readability and clarity',
    'Use larger fonts and clear layouts',
    'Maintain professional appearance',
    'Ensure accessibility and usability',
  ],
  'Baby Boomer': [
    'Prioritize readability and clarity',
    'Use larger fonts and clear layouts',
    'Maintain professional appearance',
    'Ensure accessibility and usability',
  ],
};

export const AUDIENCE_TYPE_CONSIDERATIONS: Readonly<
  Partial<Record<VisualAudienceType, readonly string[]>>
> = {
  'Business Professional': [
    'Maintain professional credibility',
    'Use business-appropriate imagery',
    'Ensure information hierarchy is clear',
    'Focus on thought leadership presentation',
  ],
  Consumer: [
    'Create emotional connection',
    'Use lifestyle and aspirational imagery',
    'Focus on benefits and outcomes',
    'Ensure easy decision-making support',
  ],
};

// ============================================
// Color and Typography
// ============================================

export interface VoiceStyle {
  psychology: string;
  colors: readonly string[];
  typography: string;
  fontCharacteristics: readonly string[];
}

// First matching voice wins
export const VOICE_STYLES: readonly (readonly [readonly string[], VoiceStyle])[] = [
  [
    ['professional', 'formal'],
    {
      psychology: 'Trust, reliability, professionalism',
      colors: ['Blue', 'Gray', 'White'],
      typography: 'Professional and authoritative',
      fontCharacteristics: ['Clean sans-serif fonts', 'High readability', 'Conservative styling'],
    },
  ],
  [
    ['friendly', 'casual'],
    {
      psychology: 'Approachability, warmth, friendliness',
      colors: ['Orange', 'Yellow', 'Green'],
      typography: 'Approachable and friendly',
      fontCharacteristics: ['Rounded fonts', 'Warm feel', 'Inviting typography'],
    },
  ],
  [
    ['innovative', 'modern'],
    {
      psychology: 'Innovation, creativity, forward-thinking',
      colors: ['Purple', 'Blue', 'Silver'],
      typography: 'Modern and innovative',
      fontCharacteristics: ['Contemporary fonts', 'Bold styling', 'Forward-thinking design'],
    },
  ],
];

export const BALANCED_VOICE_STYLE: VoiceStyle = {
  psychology: 'Balance, versatility, professionalism',
  colors: ['Blue', 'Gray', 'Accent colors'],
  typography: 'Balanced and versatile',
  fontCharacteristics: ['Readable fonts', 'Professional with personality', 'Flexible styling'],
};

export const INDUSTRY_COLORS: readonly (readonly [string, readonly string[]])[] = [
  ['healthcare', ['Blue (trust)', 'Green (health)', 'White (cleanliness)']],
  ['technology', ['Blue (trust)', 'Gray (professional)', 'Accent colors (innovation)']],
  ['finance', ['Blue (trust)', 'Green (money)', 'Gray (stability)']],
  ['e-commerce', ['Brand colors', 'High contrast', 'CTA colors']],
];

export const DEFAULT_PALETTE: BrandPalette = {
  primary: '#1E40AF',
  secondary: '#F59E0B',
  accent: '#10B981',
};

export const COLOR_MEANINGS: Readonly<Partial<Record<string, string>>> = {
  '#1E40AF': 'Blue - Trust, professionalism, stability',
  '#F59E0B': 'Orange - Energy, enthusiasm, creativity',
  '#10B981': 'Green - Growth, harmony, success',
  '#EF4444': 'Red - Urgency, passion, excitement',
  '#8B5CF6': 'Purple - Luxury, creativity, wisdom',
};

export const UNKNOWN_COLOR_MEANING = 'Professional and trustworthy';

export const COLOR_COMBINATION_STRATEGY =
  'Use 60-30-10 rule: 60% primary brand color, 30% secondary color, 10% accent color. ' +
  'Maintain consistent color hierarchy across all materials.';

export const COLOR_ACCESSIBILITY: readonly string[] = [
  'Ensure sufficient contrast ratios (WCAG AA standards)',
  'Test color combinations for colorblind accessibility',
  'Provide alternative text for color-dependent information',
];

export const TYPOGRAPHY_HIERARCHY: readonly string[] = [
  'Use maximum 3 font sizes for hierarchy',
  'Maintain consistent font weights throughout',
  'Ensure sufficient contrast between text and background',
  'Use appropriate line spacing for readability',
];

export const CONSISTENCY_CHECKLIST: readonly string[] = [
  'All materials use approved color palette',
  'Typography follows established hierarchy',
  'Imagery reflects brand personality',
  'Layout follows brand design principles',
];

// ============================================
// Per-Post Concepts
// ============================================

interface PlatformDesign {
  /** Keyed by snake_case content type; the first entry is the fallback */
  dimensions: readonly (readonly [string, string])[];
  considerations: readonly string[];
  formats: readonly string[];
  textGuidelines: string;
  spacing: string;
  typography: readonly string[];
}

export const PLATFORM_DESIGN: Record<Platform, PlatformDesign> = {
  Facebook: {
    dimensions: [
      ['feed_post', '1200x630px'],
      ['story', '1080x1920px'],
      ['cover_photo', '1200x315px'],
    ],
    considerations: [
      'Text overlay should be readable on mobile',
      'Use high contrast for better visibility',
      'Consider how content appears in news feed',
      'Include clear call-to-action elements',
    ],
    formats: ['JPEG', 'PNG'],
    textGuidelines: 'Keep text minimal, use large fonts for mobile viewing',
    spacing: 'Use generous padding, especially for mobile viewing',
    typography: [
      'Keep text overlay minimal and readable',
      'Use larger fonts for mobile viewing',
      "Ensure text doesn't compete with image",
    ],
  },
  Instagram: {
    dimensions: [
      ['feed_post', '1080x1080px (square) or 1080x1350px (portrait)'],
      ['story', '1080x1920px'],
      ['reel', '1080x1920px'],
    ],
    considerations: [
      'High visual impact is crucial',
      'Use vibrant colors and high contrast',
      'Ensure mobile-first design',
      "Consider Instagram's visual aesthetic",
    ],
    formats: ['JPEG', 'PNG', 'MP4'],
    textGuidelines: 'Minimal text overlay, let visuals speak',
    spacing: 'Tighter spacing acceptable, focus on visual impact',
    typography: [
      'Minimize text overlay on images',
      'Use bold, readable fonts for Stories',
      'Consider text in captions rather than on image',
    ],
  },
  LinkedIn: {
    dimensions: [
      ['feed_post', '1200x627px'],
      ['article_cover', '1200x627px'],
      ['company_logo', '300x300px'],
    ],
    considerations: [
      'Professional and clean aesthetic',
      'Business-appropriate imagery',
      'Clear, readable text',
      'Professional color schemes',
    ],
    formats: ['JPEG', 'PNG'],
    textGuidelines: 'Professional typography, clear messaging',
    spacing: 'Professional spacing, clean and organized layout',
    typography: [
      'Use professional, clean typography',
      'Maintain business-appropriate font choices',
      'Ensure readability in professional context',
    ],
  },
};

export const IMAGE_POST_TIPS: readonly string[] = [
  'Use high-quality, eye-catching imagery',
  'Ensure proper composition and focal point',
  'Consider rule of thirds for layout',
];

// Keyed by snake_case content type
export const CONTENT_TYPE_TIPS: Readonly<Partial<Record<string, readonly string[]>>> = {
  image_post: IMAGE_POST_TIPS,
  video: [
    'Create engaging thumbnail image',
    'Use captions for accessibility',
    'Keep opening 3 seconds compelling',
  ],
  story: [
    'Design for vertical viewing',
    'Use bold, readable text',
    'Create immersive, full-screen experience',
  ],
  reel: [
    'Design for vertical, mobile-first viewing',
    'Create hook in first 3 seconds',
    'Use trending audio and effects',
  ],
  carousel: [
    'Design cohesive visual story across slides',
    'Use consistent branding elements',
    'Create clear progression and narrative',
  ],
};

export const LAYOUT_STRUCTURES: Readonly<Partial<Record<string, string>>> = {
  image_post: 'Single focal point with supporting text overlay',
  video: 'Thumbnail with engaging opening frame and clear title',
  story: 'Full-screen vertical layout with clear messaging hierarchy',
  carousel: 'Cohesive story progression across multiple slides',
};

export const DEFAULT_LAYOUT = 'Balanced composition with clear focal point';

export const EDUCATIONAL_DESIGN: ThemeDesign = {
  approach: 'Clean, informative layout with clear hierarchy',
  keyElements: ['Infographic elements', 'Step-by-step visuals', 'Data visualization'],
  composition: 'Use grids and structured layouts for easy reading',
};

export const THEME_DESIGNS: Readonly<Partial<Record<string, ThemeDesign>>> = {
  'Educational Content': EDUCATIONAL_DESIGN,
  'Behind-the-Scenes': {
    approach: 'Authentic, candid photography with natural lighting',
    keyElements: ['Team photos', 'Process shots', 'Workspace imagery'],
    composition: 'Use documentary-style photography with natural compositions',
  },
  'Problem-Solution': {
    approach: 'Before/after comparisons or solution-focused imagery',
    keyElements: ['Comparison visuals', 'Solution highlights', 'Benefit demonstrations'],
    composition: 'Use split-screen or sequential layouts',
  },
};

export const GOAL_ADJUSTMENTS: readonly (readonly [string, string])[] = [
  ['engagement', 'Include interactive elements, questions, or polls in visual'],
  ['education', 'Focus on clear, readable information hierarchy'],
  ['awareness', 'Use bold, memorable visuals with strong brand presence'],
  ['conversion', 'Include clear call-to-action elements and benefit highlights'],
];

export const THEME_ELEMENTS: Readonly<Partial<Record<string, readonly VisualElement[]>>> = {
  'Educational Content': [
    { element: 'Infographic icons', purpose: 'Visual data representation' },
    { element: 'Step indicators', purpose: 'Process clarity' },
    { element: 'Chart/graph elements', purpose: 'Data visualization' },
  ],
  'Behind-the-Scenes': [
    { element: 'Candid photography', purpose: 'Authentic storytelling' },
    { element: 'Team member photos', purpose: 'Human connection' },
    { element: 'Workspace imagery', purpose: 'Company culture' },
  ],
  'Problem-Solution': [
    { element: 'Before/after visuals', purpose: 'Clear comparison' },
    { element: 'Solution highlights', purpose: 'Benefit demonstration' },
    { element: 'Success indicators', purpose: 'Proof of effectiveness' },
  ],
};

export const DEFAULT_ELEMENTS: readonly VisualElement[] = [
  { element: 'Brand elements', purpose: 'Consistent branding' },
  { element: 'High-quality imagery', purpose: 'Professional appearance' },
];

type ConceptMood = 'warm' | 'confident' | 'uplifting' | 'neutral';

export const CONCEPT_MOOD_RULES: KeywordRuleTable<Exclude<ConceptMood, 'neutral'>> = [
  { category: 'warm', keywords: ['warm', 'supportive'] },
  { category: 'confident', keywords: ['confident', 'bold'] },
  { category: 'uplifting', keywords: ['encouraging'] },
];

export const MOOD_COLOR_ADJUSTMENTS: Record<ConceptMood, string> = {
  warm: 'Use warmer tones and softer color transitions',
  confident: 'Use high contrast and bold color combinations',
  uplifting: 'Incorporate bright, energetic accent colors',
  neutral: 'Maintain balanced color distribution',
};

type ConceptStyle = 'professional' | 'approachable' | 'dynamic';

export const CONCEPT_STYLE_RULES: KeywordRuleTable<ConceptStyle> = [
  { category: 'professional', keywords: ['professional', 'formal'] },
  { category: 'approachable', keywords: ['casual', 'friendly'] },
  { category: 'dynamic', keywords: ['playful', 'energetic'] },
];

export const STYLE_CHARACTERISTICS: Record<ConceptStyle, Record<ConceptMood, readonly string[]>> = {
  professional: {
    warm: ['Clean layouts', 'Professional typography', 'Warm color accents'],
    confident: ['Bold typography', 'Strong compositions', 'High contrast'],
    uplifting: ['Positive imagery', 'Bright accents', 'Encouraging visuals'],
    neutral: ['Balanced compositions', 'Professional imagery', 'Clean design'],
  },
  approachable: {
    warm: ['Friendly imagery', 'Rounded elements', 'Inviting colors'],
    confident: ['Strong but friendly', 'Approachable authority', 'Warm professionalism'],
    uplifting: ['Positive messaging', 'Bright and cheerful', 'Community-focused'],
    neutral: ['Friendly professional', 'Approachable design', 'Welcoming aesthetic'],
  },
  dynamic: {
    warm: ['Energetic but warm', 'Vibrant colors', 'Active imagery'],
    confident: ['Bold and energetic', 'Strong visual impact', 'Dynamic compositions'],
    uplifting: ['High energy', 'Motivational visuals', 'Vibrant and positive'],
    neutral: ['Dynamic but balanced', 'Energetic design', 'Active visual style'],
  },
};

export const BALANCED_STYLE: readonly string[] = ['Balanced design', 'Professional approach'];
