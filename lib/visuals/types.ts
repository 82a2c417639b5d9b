import type { DayName, DayNumber } from '@/lib/planner';
import type { Platform } from '@/lib/intake';

// ============================================
// Brand Visual Guidelines
// ============================================

export type VisualPersonality =
  | 'professional_authority'
  | 'friendly_approachable'
  | 'innovative_modern'
  | 'playful_energetic'
  | 'trustworthy_reliable'
  | 'balanced_versatile';

export interface EmotionalTone {
  quality: string;
  characteristics: string[];
  mood: string;
}

export interface ValueVisuals {
  characteristics: string[];
  colors: string[];
  typography: string[];
}

export interface ValueTranslation extends ValueVisuals {
  /** Core value that matched, or `general` when none did */
  value: string;
}

export interface PersonalityVisuals {
  personalityType: VisualPersonality;
  emotionalTone: EmotionalTone;
  valueTranslations: ValueTranslation[];
  designPrinciples: string[];
  keywords: string[];
}

export interface IndustryVisualStandards {
  style: string;
  colors: string[];
  typography: string;
  imagery: string;
  trends: string[];
  avoid: string[];
}

export type AgeGroup = 'Gen Z' | 'Millennial' | 'Gen X' | 'Baby Boomer' | 'Mixed';

export type VisualAudienceType =
  | 'Business Professional'
  | 'Consumer'
  | 'Student/Educational'
  | 'Entrepreneur'
  | 'General';

export interface AudienceVisuals {
  ageGroup: AgeGroup;
  audienceType: VisualAudienceType;
  visualStyle: string[];
  colorPreferences: string[];
  visualApproach: string[];
  considerations: string[];
}

export interface StyleElement {
  element: string;
  description: string;
  implementation: string;
}

export interface BrandPalette {
  primary: string;
  secondary?: string;
  accent?: string;
}

export type PaletteRole = keyof BrandPalette;

export interface ColorGuidelines {
  psychology: string;
  recommendedColors: string[];
  industryColors: string[];
  palette: BrandPalette;
  /** Meaning of each palette color, by role */
  paletteMeaning: Partial<Record<PaletteRole, string>>;
  combinationStrategy: string;
  accessibility: string[];
}

export interface TypographyGuidelines {
  personality: string;
  fontCharacteristics: string[];
  hierarchy: string[];
}

export interface BrandVisualGuidelines {
  personality: PersonalityVisuals;
  industry: IndustryVisualStandards;
  audience: AudienceVisuals;
  /** Industry style, personality type and audience adjustments in one sentence */
  styleDirection: string;
  styleElements: StyleElement[];
  color: ColorGuidelines;
  typography: TypographyGuidelines;
  consistencyChecklist: string[];
}

export interface BrandVisualRequest {
  /** Free text holding up to three `#RRGGBB` colors: primary, secondary, accent */
  brandColors?: string;
}

// ============================================
// Visual Concepts
// ============================================

export interface PlatformDesignSpec {
  platform: Platform;
  contentType: string;
  dimensions: string;
  considerations: string[];
  formats: string[];
  textGuidelines: string;
  contentTypeTips: string[];
}

export interface ThemeDesign {
  approach: string;
  keyElements: string[];
  composition: string;
}

export interface VisualElement {
  element: string;
  purpose: string;
}

export interface VisualConcept extends ThemeDesign {
  day: DayNumber;
  dayName: DayName;
  platform: Platform;
  title: string;
  contentTheme: string;
  /** Set when the post goal names engagement, education, awareness or conversion */
  goalAdjustment: string | null;
  brandStyle: string[];
  spec: PlatformDesignSpec;
  layout: string;
  spacing: string;
  palette: BrandPalette;
  moodAdjustment: string;
  typography: string[];
  visualElements: VisualElement[];
  implementationNotes: string[];
}

export interface VisualConceptRequest {
  day: number;
}
