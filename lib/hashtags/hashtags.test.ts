import { describe, it, expect } from 'vitest';
import {
  HASHTAG_POOLS,
  allocateQuotas,
  checkCompliance,
  classifyAudience,
  extractContentKeywords,
  isRelevant,
  loadHashtagPools,
  parseCountRange,
  recommendHashtags,
  researchHashtags,
  scoreHashtag,
  selectHashtags,
  toHashtag,
  windowFor,
  type HashtagCandidate,
} from './index';
import { buildCalendar, planDailyPosts } from '@/lib/content';
import { ContextStore } from '@/lib/pipeline';
import { DAY_NUMBERS } from '@/lib/planner';
import type { BusinessProfileInput, Platform } from '@/lib/intake';
import {
  PROFESSIONAL_BRAND,
  TECH_BUSINESS,
  createStrategyStore,
  fixedClock,
} from '@/lib/testing/fixtures';

const WEEK_OF_JAN_8 = new Date(2024, 0, 8);

function calendarStore(platforms: Platform[], business: BusinessProfileInput = TECH_BUSINESS) {
  const store = createStrategyStore(business, PROFESSIONAL_BRAND, {
    platforms,
    priorities: `Primary focus on ${platforms[0]}`,
  });
  const planned = planDailyPosts(store, { seed: 7, clock: fixedClock, weekStart: WEEK_OF_JAN_8 });
  const built = buildCalendar(store, { clock: fixedClock });
  if (planned.status === 'error' || built.status === 'error') {
    throw new Error('Fixture calendar failed');
  }
  return store;
}

function candidate(tag: string, score = 0): HashtagCandidate {
  return { tag, category: 'trending', score };
}

describe('content keywords', () => {
  it('ranks words by frequency and drops stop words and short words', () => {
    expect(
      extractContentKeywords(['Growth tips for growth teams', 'Marketing growth and marketing tips'])
    ).toEqual(['growth', 'tips', 'marketing', 'teams']);
  });

  it('returns nothing for text without content words', () => {
    expect(extractContentKeywords(['A', '!!', 'Go'])).toEqual([]);
  });

  it('scores a tag once per keyword matched in either direction', () => {
    expect(scoreHashtag('#TechTrends', ['tech', 'trends', 'growth'])).toBe(2);
    expect(scoreHashtag('#tech', ['technology'])).toBe(1);
    expect(scoreHashtag('#finance', ['technology'])).toBe(0);
  });

  it('gives a bare # no score', () => {
    expect(scoreHashtag('#', ['growth', 'tech'])).toBe(0);
    expect(scoreHashtag('##', ['growth'])).toBe(0);
  });

  it('normalizes branded names into tags', () => {
    expect(toHashtag('  Acme Co ')).toBe('#AcmeCo');
    expect(toHashtag('#acme')).toBe('#acme');
  });
});

describe('hashtag selection', () => {
  it('allocates quotas with a floor of one for groups that have candidates', () => {
    expect(allocateQuotas(15, { popular: 9, niche: 9, branded: 1, content: 3 })).toEqual({
      popular: 5,
      niche: 8,
      branded: 2,
      content: 2,
    });
    expect(allocateQuotas(3, { popular: 4, niche: 4, branded: 0, content: 2 })).toEqual({
      popular: 1,
      niche: 2,
      branded: 0,
      content: 1,
    });
  });

  it('re-ranks the union by score and truncates to the maximum', () => {
    const result = selectHashtags(
      {
        popular: [candidate('#a'), candidate('#b')],
        niche: [candidate('#c', 1), candidate('#d'), candidate('#e')],
        branded: [],
        content: [candidate('#f', 2)],
      },
      { min: 1, max: 3 }
    );

    expect(result.finalSet).toEqual(['#f', '#c', '#a']);
    expect(result.breakdown).toEqual({
      popular: ['#a'],
      niche: ['#c', '#d'],
      branded: [],
      content: ['#f'],
    });
  });

  it('keeps the first occurrence of a tag repeated across groups', () => {
    const result = selectHashtags(
      { popular: [candidate('#Tech')], niche: [candidate('#tech', 1)], branded: [], content: [] },
      { min: 1, max: 3 }
    );

    expect(result.finalSet).toEqual(['#Tech']);
  });

  it('backfills from unused candidates to reach the minimum', () => {
    const result = selectHashtags(
      {
        popular: ['#alpha', '#beta', '#gamma', '#delta', '#epsilon'].map((tag) =>
          candidate(tag, tag === '#gamma' ? 1 : 0)
        ),
        niche: [],
        branded: [],
        content: [],
      },
      { min: 3, max: 5 }
    );

    expect(result.breakdown.popular).toEqual(['#gamma', '#alpha']);
    expect(result.finalSet).toEqual(['#gamma', '#alpha', '#beta']);
  });

  it('classifies audiences for the audience pools', () => {
    expect(classifyAudience('Small business owners aged 25-45')).toBe('professional');
    expect(classifyAudience('Startup founders')).toBe('entrepreneur');
    expect(classifyAudience('College students')).toBe('student');
    expect(classifyAudience('Pet lovers')).toBe('general');
  });

  it('falls back to pool tags when the post has no keywords', () => {
    const research = researchHashtags({
      post: { title: 'A', caption: '!!', contentTheme: 'Go', goal: '', platform: 'Instagram' },
      industry: 'Technology',
      audience: 'Small business owners aged 25-45',
    });

    expect(research.contentKeywords).toEqual([]);
    expect(research.window).toEqual({ min: 5, max: 15 });
    expect(research.finalSet).toEqual([
      '#business',
      '#marketing',
      '#entrepreneur',
      '#growth',
      '#success',
      '#techtrends',
      '#digitaltransformation',
      '#techinnovation',
      '#softwaredevelopment',
      '#executivecoaching',
      '#businessstrategy',
      '#professionalgrowth',
      '#careeradvancement',
    ]);
    expect(research.breakdown.branded).toEqual([]);
    expect(research.breakdown.content).toEqual([]);
  });
});

describe('recommendHashtags', () => {
  it.each<Platform>(['Facebook', 'Instagram', 'LinkedIn'])(
    'keeps every %s day inside the platform window without duplicates',
    (platform) => {
      const store = calendarStore([platform]);
      const { min, max } = windowFor(platform);

      for (const day of DAY_NUMBERS) {
        const result = recommendHashtags(store, { day, brandedTags: ['AcmeCo', '#acmeco'] });
        if (result.status === 'error') throw new Error(result.message);

        const { finalSet } = result.data;
        expect(finalSet.length).toBeGreaterThanOrEqual(min);
        expect(finalSet.length).toBeLessThanOrEqual(max);
        expect(new Set(finalSet.map((tag) => tag.toLowerCase())).size).toBe(finalSet.length);
        expect(result.data.breakdown.branded).toEqual(['#AcmeCo']);
      }
    }
  );

  it('stores the recommendation under its day', () => {
    const store = calendarStore(['Instagram', 'LinkedIn']);

    const result = recommendHashtags(store, { day: 2 });
    if (result.status === 'error') throw new Error(result.message);

    expect(result.data.day).toBe(2);
    expect(result.data.platform).toBe('LinkedIn');
    expect(result.message).toBe(
      `Hashtag research completed with ${result.data.finalSet.length} hashtags for Day 2`
    );
    expect(store.get('hashtags:2')).toEqual(result.data);
    expect(store.writerOf('hashtags:2')).toBe('hashtags');
  });

  it('publishes the LinkedIn-optimized set and keeps the researched one', () => {
    const source = calendarStore(['LinkedIn'], { ...TECH_BUSINESS, industry: 'Finance' });
    const calendar = source.require('calendar');
    const store = new ContextStore();
    store.set('business', source.require('business'));
    store.set('calendar', {
      ...calendar,
      dailyPosts: calendar.dailyPosts.map((post) => ({
        ...post,
        title: 'Personal finance',
        caption: 'Personal finance',
        contentTheme: 'Finance',
        goal: 'Personal',
        postType: 'Article',
      })),
    });

    const result = recommendHashtags(store, { day: 1 });
    if (result.status === 'error') throw new Error(result.message);

    expect(result.data.researchedSet).toEqual([
      '#personalfinance',
      '#finance',
      '#personal',
      '#business',
      '#financialfreedom',
    ]);
    expect(result.data.finalSet).toEqual(['#finance', '#business', '#financialfreedom']);
    expect(result.data.optimization).toEqual({
      contentType: 'Article',
      removed: ['#personalfinance', '#personal'],
      backfilled: [],
      window: { min: 3, max: 5 },
      underfilled: false,
    });
    expect(result.data.compliance.avoidListCompliance).toEqual({
      passed: true,
      remediation: 'No action needed',
    });
    expect(store.get('hashtags:1')?.finalSet).toEqual(['#finance', '#business', '#financialfreedom']);
  });

  it('rejects a day outside the week', () => {
    const store = calendarStore(['Instagram']);

    expect(recommendHashtags(store, { day: 8 })).toEqual({
      status: 'error',
      message: 'day out of range',
      error: { kind: 'validation', details: ['day: expected 1-7, got 8'] },
    });
  });

  it('rejects blank branded tags', () => {
    const store = calendarStore(['Instagram']);

    const result = recommendHashtags(store, { day: 1, brandedTags: [' '] });

    expect(result.status).toBe('error');
    expect(result.message).toBe('Invalid branded tags: 0: branded tags must not be empty');
    expect(store.has('hashtags:1')).toBe(false);
  });

  it('rejects branded tags with nothing after the #', () => {
    const store = calendarStore(['LinkedIn']);

    expect(recommendHashtags(store, { day: 1, brandedTags: ['AcmeCo', '##'] })).toEqual({
      status: 'error',
      message: 'Invalid branded tags: 1: branded tags must not be empty',
      error: { kind: 'validation', details: ['1: branded tags must not be empty'] },
    });
    expect(store.has('hashtags:1')).toBe(false);
  });

  it('requires the calendar', () => {
    const store = createStrategyStore();

    expect(recommendHashtags(store, { day: 1 })).toEqual({
      status: 'error',
      message: 'Missing required artifacts: calendar',
      error: { kind: 'missing_artifact', details: ['calendar'] },
    });
  });
});

describe('platform guidelines', () => {
  it('parses count ranges', () => {
    expect(parseCountRange('10-15')).toEqual({ min: 10, max: 15 });
    expect(parseCountRange('many')).toBeNull();
  });

  it('narrows the window by content type within the platform window', () => {
    expect(windowFor('Instagram', 'Story')).toEqual({ min: 5, max: 5 });
    expect(windowFor('Instagram', 'Reel')).toEqual({ min: 8, max: 12 });
    expect(windowFor('LinkedIn', 'Image Post')).toEqual({ min: 3, max: 4 });
    expect(windowFor('Facebook', 'Carousel')).toEqual({ min: 1, max: 3 });
  });
});

describe('checkCompliance', () => {
  it('passes a small community set on Facebook', () => {
    const report = checkCompliance(['#community', '#business'], 'Facebook', 'Technology');

    expect(report.overall).toBe(true);
    expect(report.bestPracticeAdherence).toEqual({ passed: true, remediation: 'No action needed' });
  });

  it('reports count and appropriateness failures with remediation', () => {
    const report = checkCompliance(['#fun'], 'Instagram', 'Technology');

    expect(report.countCompliance).toEqual({
      passed: false,
      remediation: 'Use between 5 and 15 hashtags on Instagram',
    });
    expect(report.appropriatenessCompliance).toEqual({
      passed: false,
      remediation:
        'Replace hashtags that are not Instagram-suitable (business, entrepreneur, marketing, industry, lifestyle, creative)',
    });
    expect(report.avoidListCompliance.passed).toBe(true);
    expect(report.overall).toBe(false);
  });

  it('fails appropriateness when one casual tag joins a professional set', () => {
    const professional = ['#business', '#professional', '#careergrowth'];

    const clean = checkCompliance(professional, 'LinkedIn', 'Technology');
    const mixed = checkCompliance([...professional, '#weekendvibes'], 'LinkedIn', 'Technology');

    expect(clean.appropriatenessCompliance.passed).toBe(true);
    expect(mixed.appropriatenessCompliance).toEqual({
      passed: false,
      remediation:
        'Replace hashtags that are not LinkedIn-suitable (business, professional, career, industry, leadership, networking)',
    });
    expect(mixed.avoidListCompliance.passed).toBe(true);
    expect(mixed.overall).toBe(false);
  });

  it('flags tags on the avoid list', () => {
    const report = checkCompliance(['#lifestyle', '#business', '#career'], 'LinkedIn', 'Technology');

    expect(report.avoidListCompliance).toEqual({
      passed: false,
      remediation: "Remove hashtags that appear on the platform's avoid list",
    });
  });

  it('measures relevance against the words of the industry', () => {
    expect(isRelevant(['#technologynews', '#business'], 'Technology')).toBe(true);
    expect(isRelevant(['#business', '#growth', '#technologynews'], 'Technology')).toBe(false);
  });
});

describe('loadHashtagPools', () => {
  it('loads the bundled pools', () => {
    expect(loadHashtagPools().generalTrending).toEqual([
      '#business',
      '#marketing',
      '#entrepreneur',
      '#growth',
      '#success',
    ]);
  });

  it('rejects tags without a leading #', () => {
    expect(() => loadHashtagPools({ ...HASHTAG_POOLS, generalTrending: ['business'] })).toThrow(
      'Hashtags start with # and contain no spaces'
    );
  });
});
