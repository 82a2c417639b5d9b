export {
  analyzeBrandVisuals,
  buildBrandVisualGuidelines,
  determineVisualPersonality,
  translateValues,
  emotionalToneFor,
  personalityKeywords,
  industryVisuals,
  audienceVisuals,
  parseBrandPalette,
  describePalette,
  colorGuidelines,
  typographyGuidelines,
} from './brand-visuals';
export {
  generateVisualConcept,
  designVisualConcept,
  platformDesignSpec,
  brandStyleFor,
  contentTypeKey,
} from './concepts';

export type {
  VisualPersonality,
  EmotionalTone,
  ValueTranslation,
  PersonalityVisuals,
  IndustryVisualStandards,
  AgeGroup,
  VisualAudienceType,
  AudienceVisuals,
  StyleElement,
  BrandPalette,
  ColorGuidelines,
  TypographyGuidelines,
  BrandVisualGuidelines,
  BrandVisualRequest,
  PlatformDesignSpec,
  ThemeDesign,
  VisualElement,
  VisualConcept,
  VisualConceptRequest,
} from './types';
