import { z } from 'zod';
import { containsAny, lookupBySubstring, matchFirst } from '@/lib/rules';
import { runStage, type ContextStore, type StageResult } from '@/lib/pipeline';
import { parseInput, type BrandProfile, type BusinessProfile } from '@/lib/intake';
import type {
  AudienceVisuals,
  BrandPalette,
  BrandVisualGuidelines,
  BrandVisualRequest,
  ColorGuidelines,
  EmotionalTone,
  IndustryVisualStandards,
  PaletteRole,
  PersonalityVisuals,
  StyleElement,
  TypographyGuidelines,
  ValueTranslation,
  ValueVisuals,
  VisualPersonality,
} from './types';
import {
  AGE_GROUP_CONSIDERATIONS,
  AGE_GROUP_RULES,
  AGE_GROUP_VISUALS,
  AUDIENCE_TYPE_APPROACH,
  AUDIENCE_TYPE_CONSIDERATIONS,
  AUDIENCE_TYPE_RULES,
  BALANCED_VOICE_STYLE,
  COLOR_ACCESSIBILITY,
  COLOR_COMBINATION_STRATEGY,
  COLOR_MEANINGS,
  CONSISTENCY_CHECKLIST,
  DEFAULT_EMOTIONAL_TONE,
  DEFAULT_PALETTE,
  DEFAULT_PERSONALITY_KEYWORDS,
  EMOTIONAL_TONES,
  GENERAL_VALUE_VISUALS,
  INDUSTRY_COLORS,
  INDUSTRY_VISUALS,
  KEYWORD_SYNONYMS,
  MAX_PERSONALITY_KEYWORDS,
  PERSONALITY_PRINCIPLES,
  PERSONALITY_RULES,
  PROFESSIONAL_SERVICES_VISUALS,
  TYPOGRAPHY_HIERARCHY,
  UNKNOWN_COLOR_MEANING,
  VALUE_VISUALS,
  VOICE_STYLES,
  type VoiceStyle,
} from './tables';

const HEX_COLOR = /#[A-Fa-f0-9]{6}/g;

const PALETTE_ROLES: readonly PaletteRole[] = ['primary', 'secondary', 'accent'];

const BrandVisualRequestSchema = z.object({
  brandColors: z.string({ invalid_type_error: 'brandColors must be text' }).trim().optional(),
});

// ============================================
// Personality
// ============================================

export function determineVisualPersonality(voice: string): VisualPersonality {
  return matchFirst(voice, PERSONALITY_RULES, 'balanced_versatile');
}

/**
 * Visual traits of every core value named, or a general set when none is known
 */
export function translateValues(coreValues: string): ValueTranslation[] {
  const text = coreValues.toLowerCase();
  const matched = VALUE_VISUALS.filter(([value]) => text.includes(value));
  const entries: readonly (readonly [string, ValueVisuals])[] =
    matched.length > 0 ? matched : [['general', GENERAL_VALUE_VISUALS]];

  return entries.map(([value, visuals]) => ({
    value,
    characteristics: [...visuals.characteristics],
    colors: [...visuals.colors],
    typography: [...visuals.typography],
  }));
}

export function emotionalToneFor(tone: string): EmotionalTone {
  const match = lookupBySubstring(tone, EMOTIONAL_TONES) ?? DEFAULT_EMOTIONAL_TONE;
  return { ...match, characteristics: [...match.characteristics] };
}

export function designPrinciples(personality: VisualPersonality, tone: EmotionalTone): string[] {
  return [
    ...PERSONALITY_PRINCIPLES[personality],
    `Incorporate ${tone.characteristics[0].toLowerCase()}`,
    `Maintain ${tone.mood.toLowerCase()} visual mood`,
    `Use ${tone.quality.toLowerCase()} design approach`,
  ];
}

/**
 * Comma-separated adjectives, each followed by up to two visual synonyms, deduplicated
 */
export function personalityKeywords(adjectives: string): string[] {
  const words = adjectives
    .toLowerCase()
    .split(',')
    .map((word) => word.trim())
    .filter((word) => word.length > 0);

  if (words.length === 0) return [...DEFAULT_PERSONALITY_KEYWORDS];

  const keywords = words.flatMap((word) => [word, ...(KEYWORD_SYNONYMS[word] ?? [])]);
  return [...new Set(keywords)].slice(0, MAX_PERSONALITY_KEYWORDS);
}

export function analyzePersonality(brand: BrandProfile): PersonalityVisuals {
  const personalityType = determineVisualPersonality(brand.voice);
  const emotionalTone = emotionalToneFor(brand.tone);

  return {
    personalityType,
    emotionalTone,
    valueTranslations: translateValues(brand.coreValues),
    designPrinciples: designPrinciples(personalityType, emotionalTone),
    keywords: personalityKeywords(brand.personalityAdjectives),
  };
}

// ============================================
// Industry and Audience
// ============================================

export function industryVisuals(industry: string): IndustryVisualStandards {
  const standards = lookupBySubstring(industry, INDUSTRY_VISUALS) ?? PROFESSIONAL_SERVICES_VISUALS;
  return {
    ...standards,
    colors: [...standards.colors],
    trends: [...standards.trends],
    avoid: [...standards.avoid],
  };
}

export function audienceVisuals(audience: string): AudienceVisuals {
  const ageGroup = matchFirst(audience, AGE_GROUP_RULES, 'Mixed');
  const audienceType = matchFirst(audience, AUDIENCE_TYPE_RULES, 'General');

  return {
    ageGroup,
    audienceType,
    visualStyle: [...AGE_GROUP_VISUALS[ageGroup].visualStyle],
    colorPreferences: [...AGE_GROUP_VISUALS[ageGroup].colorPreferences],
    visualApproach: [...AUDIENCE_TYPE_APPROACH[audienceType]],
    considerations: [
      ...(AGE_GROUP_CONSIDERATIONS[ageGroup] ?? []),
      ...(AUDIENCE_TYPE_CONSIDERATIONS[audienceType] ?? []),
    ],
  };
}

// ============================================
// Style, Color and Typography
// ============================================

function personalityLabel(personality: VisualPersonality): string {
  return personality.replace('_', ' ');
}

export function styleDirection(
  personality: PersonalityVisuals,
  industry: IndustryVisualStandards,
  audience: AudienceVisuals
): string {
  return (
    `Balancing ${industry.style} industry standards with ${personalityLabel(personality.personalityType)} ` +
    `brand personality, tuned for the audience: age-appropriate ${audience.visualStyle[0].toLowerCase()} ` +
    `styling, ${audience.visualApproach[0].toLowerCase()} approach`
  );
}

export function styleElements(
  personality: PersonalityVisuals,
  industry: IndustryVisualStandards
): StyleElement[] {
  const { emotionalTone } = personality;
  return [
    {
      element: 'Color Palette',
      description: `Industry-appropriate colors with ${emotionalTone.quality.toLowerCase()} emphasis`,
      implementation: 'Use industry colors with personality-driven accents',
    },
    {
      element: 'Typography',
      description: `${industry.typography} reflecting a ${personalityLabel(personality.personalityType)} personality`,
      implementation: 'Maintain readability while reflecting brand personality',
    },
    {
      element: 'Imagery Style',
      description: `${industry.imagery} reflecting a ${emotionalTone.mood.toLowerCase()} mood`,
      implementation: 'Source imagery that reflects both industry standards and brand mood',
    },
    {
      element: 'Layout Approach',
      description: `${personalityLabel(personality.personalityType)} meets ${industry.style}`,
      implementation: 'Balance professional standards with personality expression',
    },
  ];
}

function voiceStyle(voice: string): VoiceStyle {
  const match = VOICE_STYLES.find(([keywords]) => containsAny(voice, keywords));
  return match ? match[1] : BALANCED_VOICE_STYLE;
}

/**
 * Up to three `#RRGGBB` colors in order; the default palette when there are none
 */
export function parseBrandPalette(text = ''): BrandPalette {
  const colors: string[] = text.match(HEX_COLOR) ?? [];
  if (colors.length === 0) return { ...DEFAULT_PALETTE };

  const palette: BrandPalette = { primary: colors[0].toUpperCase() };
  if (colors.length > 1) palette.secondary = colors[1].toUpperCase();
  if (colors.length > 2) palette.accent = colors[2].toUpperCase();
  return palette;
}

export function describePalette(palette: BrandPalette): Partial<Record<PaletteRole, string>> {
  const meanings: Partial<Record<PaletteRole, string>> = {};
  for (const role of PALETTE_ROLES) {
    const color = palette[role];
    if (color) meanings[role] = COLOR_MEANINGS[color] ?? UNKNOWN_COLOR_MEANING;
  }
  return meanings;
}

export function colorGuidelines(
  brand: BrandProfile,
  industry: string,
  brandColors?: string
): ColorGuidelines {
  const style = voiceStyle(brand.voice);
  const palette = parseBrandPalette(brandColors);

  return {
    psychology: style.psychology,
    recommendedColors: [...style.colors],
    industryColors: [...(lookupBySubstring(industry, INDUSTRY_COLORS) ?? [])],
    palette,
    paletteMeaning: describePalette(palette),
    combinationStrategy: COLOR_COMBINATION_STRATEGY,
    accessibility: [...COLOR_ACCESSIBILITY],
  };
}

export function typographyGuidelines(brand: BrandProfile): TypographyGuidelines {
  const style = voiceStyle(brand.voice);
  return {
    personality: style.typography,
    fontCharacteristics: [...style.fontCharacteristics],
    hierarchy: [...TYPOGRAPHY_HIERARCHY],
  };
}

export function buildBrandVisualGuidelines(
  business: BusinessProfile,
  brand: BrandProfile,
  brandColors?: string
): BrandVisualGuidelines {
  const personality = analyzePersonality(brand);
  const industry = industryVisuals(business.industry);
  const audience = audienceVisuals(business.targetAudience);

  return {
    personality,
    industry,
    audience,
    styleDirection: styleDirection(personality, industry, audience),
    styleElements: styleElements(personality, industry),
    color: colorGuidelines(brand, business.industry, brandColors),
    typography: typographyGuidelines(brand),
    consistencyChecklist: [...CONSISTENCY_CHECKLIST],
  };
}

/**
 * Stage: requires business and brand, writes `visuals`
 */
export function analyzeBrandVisuals(
  store: ContextStore,
  request: BrandVisualRequest = {}
): StageResult<BrandVisualGuidelines> {
  return runStage(store, {
    name: 'visuals',
    requires: ['business', 'brand'],
    compute: (source) => {
      const { brandColors } = parseInput(BrandVisualRequestSchema, request, 'brand visual request');
      return buildBrandVisualGuidelines(
        source.require('business'),
        source.require('brand'),
        brandColors
      );
    },
    commit: (target, guidelines) => target.set('visuals', guidelines),
    describe: () => 'Brand visual analysis completed successfully',
  });
}
