import { describe, it, expect } from 'vitest';
import {
  PLACEHOLDER_THEME,
  analyzeThemes,
  buildCalendar,
  buildCalendarTable,
  createPlaceholderPost,
  isPlaceholderPost,
  planDailyPosts,
} from './index';
import { DAY_NUMBERS } from '@/lib/planner';
import {
  PROFESSIONAL_BRAND,
  FIXED_NOW,
  createIntakeStore,
  createStrategyStore,
  fixedClock,
} from '@/lib/testing/fixtures';

const WEEK_OF_JAN_8 = new Date(2024, 0, 8);

function storeWithPosts(count: number) {
  const store = createStrategyStore();
  const result = planDailyPosts(store, {
    seed: 11,
    clock: fixedClock,
    weekStart: WEEK_OF_JAN_8,
    days: DAY_NUMBERS.slice(0, count),
  });
  if (result.status === 'error') {
    throw new Error(result.message);
  }
  return store;
}

describe('buildCalendar', () => {
  it.each([0, 1, 2, 3, 4, 5, 6, 7])('always returns seven posts when %i exist', (count) => {
    const store = storeWithPosts(count);

    const result = buildCalendar(store, { clock: fixedClock, weekStart: WEEK_OF_JAN_8 });

    expect(result.status).toBe('success');
    const calendar = store.get('calendar');
    expect(calendar?.dailyPosts).toHaveLength(7);
    expect(calendar?.dailyPosts.map((post) => post.day)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(calendar?.placeholderDays).toEqual(DAY_NUMBERS.slice(count));
    expect(calendar?.dailyPosts.filter(isPlaceholderPost)).toHaveLength(7 - count);
  });

  it('fills missing days with fixed placeholder content', () => {
    const store = createStrategyStore();

    buildCalendar(store, { clock: fixedClock, weekStart: WEEK_OF_JAN_8 });

    expect(store.get('calendar')?.dailyPosts[2]).toEqual({
      day: 3,
      dayName: 'Wednesday',
      platform: 'Instagram',
      goal: 'Increase audience engagement',
      postType: 'Image Post',
      title: 'Day 3 Content',
      caption: 'Content placeholder - please generate specific content for this day.',
      contentTheme: 'General Content',
      platformOptimization: {
        bestPostingTimes: '11 AM - 1 PM, 5 PM - 7 PM',
        optimalLength: '125 characters for captions',
        engagementTips: 'Use Stories, engage with comments quickly',
        visualRecommendations: 'Square images 1080x1080px, high contrast',
      },
      brandAlignment: {
        voice: 'Professional and authoritative',
        tone: 'Encouraging and supportive',
        values: 'Innovation, quality, customer-first',
      },
      targetAudience: 'General audience',
      scheduledDate: '2024-01-10',
      timestamp: FIXED_NOW.toISOString(),
    });
  });

  it('reports a missing strategy as an error, not placeholders', () => {
    const store = createIntakeStore();

    const result = buildCalendar(store, { clock: fixedClock });

    expect(result).toEqual({
      status: 'error',
      message: 'Missing required artifacts: strategy',
      error: { kind: 'missing_artifact', details: ['strategy'] },
    });
    expect(store.has('calendar')).toBe(false);
  });

  it('aggregates an all-placeholder week', () => {
    const store = createStrategyStore();

    buildCalendar(store, { clock: fixedClock, weekStart: WEEK_OF_JAN_8 });
    const calendar = store.get('calendar');

    expect(calendar?.statistics).toEqual({
      contentTypeDistribution: { 'Image Post': 7 },
      platformDistribution: { Instagram: 7 },
      themeDistribution: { 'General Content': 7 },
      goalDistribution: { 'Increase audience engagement': 7 },
      totalPosts: 7,
      uniquePlatforms: 1,
      uniqueThemes: 1,
    });
    expect(calendar?.themeAnalysis.themeConsistency).toEqual({
      'General Content': { goalDiversity: 1, consistencyScore: 1 },
    });
  });

  it('summarizes a fully generated week per platform', () => {
    const store = storeWithPosts(7);

    buildCalendar(store, { clock: fixedClock });
    const calendar = store.get('calendar');

    expect(calendar?.platformSummaries.Instagram).toEqual({
      totalPosts: 4,
      contentTypes: { 'Feed Post': 4 },
      themes: { 'Educational Content': 2, 'Problem-Solution': 2 },
      postingSchedule: { Monday: 1, Wednesday: 1, Friday: 1, Sunday: 1 },
    });
    expect(calendar?.platformSummaries.LinkedIn?.totalPosts).toBe(3);
    expect(calendar?.platformSummaries.Facebook).toBeUndefined();
    expect(calendar?.implementationGuide.postingSchedule.optimalTimes).toEqual({
      Instagram: '11 AM - 1 PM, 5 PM - 7 PM, Monday-Friday',
      LinkedIn: '8 AM - 10 AM, 12 PM - 2 PM, Tuesday-Thursday',
    });
    expect(calendar?.overview).toMatchObject({
      totalPosts: 7,
      platformsCovered: ['Instagram', 'LinkedIn'],
      calendarPeriod: '1 week',
      weekStart: '2024-01-08',
    });
  });

  it('takes the week from generated posts over the option', () => {
    const store = storeWithPosts(2);

    buildCalendar(store, { clock: fixedClock, weekStart: new Date(2024, 1, 5) });
    const calendar = store.get('calendar');

    expect(calendar?.overview.weekStart).toBe('2024-01-08');
    expect(calendar?.dailyPosts[6].scheduledDate).toBe('2024-01-14');
  });
});

describe('calendar helpers', () => {
  const placeholder = (day: 1 | 2 | 3, goal: string) => ({
    ...createPlaceholderPost(day, PROFESSIONAL_BRAND, WEEK_OF_JAN_8, FIXED_NOW),
    contentTheme: 'Educational Content',
    goal,
  });

  it('scores themes with more than two goals at 0.5', () => {
    const analysis = analyzeThemes([
      placeholder(1, 'Goal A'),
      placeholder(2, 'Goal B'),
      placeholder(3, 'Goal C'),
    ]);

    expect(analysis.themeConsistency['Educational Content']).toEqual({
      goalDiversity: 3,
      consistencyScore: 0.5,
    });
    expect(analysis.themeGoals['Educational Content']).toEqual(['Goal A', 'Goal B', 'Goal C']);
  });

  it('keeps two goals per theme consistent', () => {
    const analysis = analyzeThemes([placeholder(1, 'Goal A'), placeholder(2, 'Goal B')]);

    expect(analysis.themeConsistency['Educational Content'].consistencyScore).toBe(1);
  });

  it('truncates long titles and goals in table rows', () => {
    const post = {
      ...createPlaceholderPost(1, PROFESSIONAL_BRAND, WEEK_OF_JAN_8, FIXED_NOW),
      title: 'A'.repeat(60),
      goal: 'Educate audience about industry topics and establish thought leadership',
    };

    expect(buildCalendarTable([post])).toEqual([
      {
        day: 'Monday',
        platform: 'Instagram',
        type: 'Image Post',
        title: `${'A'.repeat(50)}...`,
        goal: 'Educate audience about industr...',
        theme: 'General Content',
      },
    ]);
  });

  it('detects placeholders by theme', () => {
    const post = createPlaceholderPost(5, PROFESSIONAL_BRAND, WEEK_OF_JAN_8, FIXED_NOW);

    expect(post.contentTheme).toBe(PLACEHOLDER_THEME);
    expect(isPlaceholderPost({ ...post, contentTheme: 'Behind-the-Scenes' })).toBe(false);
  });
});
