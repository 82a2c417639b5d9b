import { lookupBySubstring, matchFirst } from '@/lib/rules';
import { isDayNumber } from '@/lib/planner';
import {
  ValidationError,
  runStage,
  visualKey,
  type ContextStore,
  type StageResult,
} from '@/lib/pipeline';
import type { BrandProfile, Platform } from '@/lib/intake';
import type { DailyPost } from '@/lib/content';
import type {
  BrandVisualGuidelines,
  PlatformDesignSpec,
  VisualConcept,
  VisualConceptRequest,
} from './types';
import {
  BALANCED_STYLE,
  CONCEPT_MOOD_RULES,
  CONCEPT_STYLE_RULES,
  CONTENT_TYPE_TIPS,
  DEFAULT_ELEMENTS,
  DEFAULT_LAYOUT,
  EDUCATIONAL_DESIGN,
  GOAL_ADJUSTMENTS,
  IMAGE_POST_TIPS,
  LAYOUT_STRUCTURES,
  MOOD_COLOR_ADJUSTMENTS,
  PLATFORM_DESIGN,
  STYLE_CHARACTERISTICS,
  THEME_DESIGNS,
  THEME_ELEMENTS,
} from './tables';

/** `Image Post` -> `image_post` */
export function contentTypeKey(contentType: string): string {
  return contentType.trim().toLowerCase().replaceAll(' ', '_');
}

export function platformDesignSpec(platform: Platform, contentType: string): PlatformDesignSpec {
  const design = PLATFORM_DESIGN[platform];
  const key = contentTypeKey(contentType);
  const dimensions = design.dimensions.find(([type]) => type === key) ?? design.dimensions[0];

  return {
    platform,
    contentType,
    dimensions: dimensions[1],
    considerations: [...design.considerations],
    formats: [...design.formats],
    textGuidelines: design.textGuidelines,
    contentTypeTips: [...(CONTENT_TYPE_TIPS[key] ?? IMAGE_POST_TIPS)],
  };
}

/**
 * Style keywords from the brand voice, shaded by the tone's mood
 */
export function brandStyleFor(brand: Pick<BrandProfile, 'voice' | 'tone'>): {
  brandStyle: string[];
  moodAdjustment: string;
} {
  const mood = matchFirst(brand.tone, CONCEPT_MOOD_RULES, 'neutral');
  const style = matchFirst(brand.voice, CONCEPT_STYLE_RULES, 'balanced');

  return {
    brandStyle: style === 'balanced' ? [...BALANCED_STYLE] : [...STYLE_CHARACTERISTICS[style][mood]],
    moodAdjustment: MOOD_COLOR_ADJUSTMENTS[mood],
  };
}

export function implementationNotes(platform: Platform): string[] {
  return [
    'Ensure all text is readable at small sizes for mobile viewing',
    'Test design in actual platform context before finalizing',
    'Maintain brand consistency across all visual elements',
    'Consider accessibility guidelines for color contrast and text size',
    `Optimize for ${platform} best practices and user expectations`,
    'Prepare multiple format variations if needed for different placements',
  ];
}

export function designVisualConcept(
  post: DailyPost,
  brand: BrandProfile,
  guidelines: BrandVisualGuidelines
): VisualConcept {
  const theme = THEME_DESIGNS[post.contentTheme] ?? EDUCATIONAL_DESIGN;
  const platformDesign = PLATFORM_DESIGN[post.platform];

  return {
    day: post.day,
    dayName: post.dayName,
    platform: post.platform,
    title: post.title,
    contentTheme: post.contentTheme,
    approach: theme.approach,
    keyElements: [...theme.keyElements],
    composition: theme.composition,
    goalAdjustment: lookupBySubstring(post.goal, GOAL_ADJUSTMENTS) ?? null,
    ...brandStyleFor(brand),
    spec: platformDesignSpec(post.platform, post.postType),
    layout: LAYOUT_STRUCTURES[contentTypeKey(post.postType)] ?? DEFAULT_LAYOUT,
    spacing: platformDesign.spacing,
    palette: { ...guidelines.color.palette },
    typography: [
      ...platformDesign.typography,
      `Follow the brand's ${guidelines.typography.personality.toLowerCase()} type style`,
    ],
    visualElements: (THEME_ELEMENTS[post.contentTheme] ?? DEFAULT_ELEMENTS).map((element) => ({
      ...element,
    })),
    implementationNotes: implementationNotes(post.platform),
  };
}

/**
 * Stage: requires brand, visuals and calendar, writes `visual:<day>`
 */
export function generateVisualConcept(
  store: ContextStore,
  request: VisualConceptRequest
): StageResult<VisualConcept> {
  return runStage(store, {
    name: 'visuals',
    requires: ['brand', 'visuals', 'calendar'],
    compute: (source) => {
      const { day } = request;
      if (!isDayNumber(day)) {
        throw new ValidationError('day out of range', [`day: expected 1-7, got ${day}`]);
      }

      const post = source.require('calendar').dailyPosts[day - 1];
      return designVisualConcept(post, source.require('brand'), source.require('visuals'));
    },
    commit: (target, concept) => target.set(visualKey(concept.day), concept),
    describe: (concept) =>
      `Visual concept created for Day ${concept.day} (${concept.platform} ${concept.spec.contentType})`,
  });
}
