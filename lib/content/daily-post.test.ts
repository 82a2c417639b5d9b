import { describe, it, expect } from 'vitest';
import {
  choosePostType,
  formatCaption,
  generateDailyPost,
  planDailyPosts,
  platformForDay,
  resolveGoal,
} from './index';
import { ContextStore } from '@/lib/pipeline';
import { WEEKDAYS, createSeededRandom, type DayNumber, type RandomSource } from '@/lib/planner';
import { createStrategyStore, FIXED_NOW, fixedClock } from '@/lib/testing/fixtures';

const firstChoice: RandomSource = {
  next: () => 0,
  nextInt: () => 0,
  choice: (items) => items[0],
  shuffle: (items) => [...items],
};

const lastChoice: RandomSource = {
  next: () => 0.99,
  nextInt: (max) => max - 1,
  choice: (items) => items[items.length - 1],
  shuffle: (items) => [...items],
};

const WEEK_OF_JAN_8 = new Date(2024, 0, 8);

describe('generateDailyPost', () => {
  it('assembles an Instagram post with sentence-per-paragraph caption', () => {
    const store = createStrategyStore();

    const result = generateDailyPost(
      store,
      { day: 1, theme: 'Educational Content', postType: 'Carousel', platform: 'Instagram' },
      { random: firstChoice, clock: fixedClock, weekStart: WEEK_OF_JAN_8 }
    );

    expect(result.status).toBe('success');
    expect(store.get('post:1')).toEqual({
      day: 1,
      dayName: 'Monday',
      platform: 'Instagram',
      goal: 'Educate audience about industry topics and establish thought leadership',
      postType: 'Carousel',
      title: '✨ Educational Content: What You Need to Know',
      caption:
        'Did you know that...\n\n' +
        "As Technology professionals, it's crucial to stay informed about industry trends and best practices.\n\n" +
        'Here are three key insights that can help Small business owners aged 25-45 stay ahead of the curve.\n\n' +
        'Double tap if you agree! 👆',
      contentTheme: 'Educational Content',
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
      targetAudience: 'Small business owners aged 25-45',
      scheduledDate: '2024-01-08',
      timestamp: FIXED_NOW.toISOString(),
    });
  });

  it('keeps LinkedIn captions verbatim and uses the weekday focus for other themes', () => {
    const store = createStrategyStore();

    const result = generateDailyPost(
      store,
      { day: 4, theme: 'Innovation & Trends', postType: 'Article', platform: 'LinkedIn' },
      { random: firstChoice, clock: fixedClock, weekStart: WEEK_OF_JAN_8 }
    );

    expect(result.status === 'success' && result.data).toMatchObject({
      dayName: 'Thursday',
      goal: 'Increase audience engagement and interaction',
      title: 'How Technology Professionals Can Stay Ahead',
      caption:
        'Did you know that...\n\n' +
        'Our approach is rooted in Innovation, quality, customer-first, ensuring we deliver value to Small business owners aged 25-45.\n\n' +
        'What are your thoughts on this? Share your experience in the comments below.',
      scheduledDate: '2024-01-11',
    });
  });

  it('fills the problem into problem-solution hooks', () => {
    const store = createStrategyStore(undefined, undefined, { platforms: ['Facebook'] });

    const result = generateDailyPost(
      store,
      { day: 3, theme: 'Problem-Solution', postType: 'Text Post', platform: 'Facebook' },
      { random: lastChoice, clock: fixedClock, weekStart: WEEK_OF_JAN_8 }
    );

    expect(result.status === 'success' && result.data).toMatchObject({
      goal: 'Address customer pain points and showcase solution value',
      title: 'The Truth About Problem-Solution for Small business owners aged 25-45',
      caption:
        "If you're dealing with low engagement rates and difficulty reaching target audience, this is for you.\n\n" +
        "We understand that Low engagement rates and difficulty reaching target audience can be challenging. That's why we've developed solutions specifically designed for Small business owners aged 25-45.\n\n" +
        "We'd love to hear from you - comment below!",
    });
  });

  it('reproduces the same post for the same seed', () => {
    const request = {
      day: 5,
      theme: 'Behind-the-Scenes',
      postType: 'Image Post',
      platform: 'LinkedIn',
    };
    const options = { clock: fixedClock, weekStart: WEEK_OF_JAN_8 };

    const first = generateDailyPost(createStrategyStore(), request, {
      ...options,
      random: createSeededRandom(42),
    });
    const second = generateDailyPost(createStrategyStore(), request, {
      ...options,
      random: createSeededRandom(42),
    });

    expect(first).toEqual(second);
  });

  it('rejects a day out of range without writing', () => {
    const store = createStrategyStore();

    const result = generateDailyPost(
      store,
      { day: 0, theme: 'Educational Content', postType: 'Video', platform: 'Instagram' },
      { random: firstChoice, clock: fixedClock }
    );

    expect(result.status === 'error' && result.message).toBe('day out of range');
    expect(store.keys().some((key) => key.startsWith('post:'))).toBe(false);
  });

  it('treats a fractional day as out of range', () => {
    const result = generateDailyPost(
      createStrategyStore(),
      { day: 2.5, theme: 'Educational Content', postType: 'Video', platform: 'LinkedIn' },
      { random: firstChoice, clock: fixedClock }
    );

    expect(result).toEqual({
      status: 'error',
      message: 'day out of range',
      error: { kind: 'validation', details: ['day: expected 1-7, got 2.5'] },
    });
  });

  it('rejects an empty theme', () => {
    const result = generateDailyPost(
      createStrategyStore(),
      { day: 2, theme: '   ', postType: 'Video', platform: 'LinkedIn' },
      { random: firstChoice, clock: fixedClock }
    );

    expect(result).toEqual({
      status: 'error',
      message: 'Invalid daily post request: theme: theme must not be empty',
      error: { kind: 'validation', details: ['theme: theme must not be empty'] },
    });
  });

  it('rejects a platform outside the selection', () => {
    const result = generateDailyPost(
      createStrategyStore(),
      { day: 2, theme: 'Educational Content', postType: 'Video', platform: 'Facebook' },
      { random: firstChoice, clock: fixedClock }
    );

    expect(result.status === 'error' && result.error.kind).toBe('validation');
  });

  it('reports every missing artifact', () => {
    const result = generateDailyPost(
      new ContextStore(),
      { day: 2, theme: 'Educational Content', postType: 'Video', platform: 'Instagram' },
      { random: firstChoice }
    );

    expect(result.status === 'error' && result.error.details).toEqual([
      'business',
      'brand',
      'platforms',
      'strategy',
    ]);
  });
});

describe('post helpers', () => {
  it('resolves goals by theme, then focus, then default', () => {
    expect(resolveGoal('Educational Content', 'brand_awareness')).toBe(
      'Educate audience about industry topics and establish thought leadership'
    );
    expect(resolveGoal('Weekly Roundup', 'education')).toBe(
      'Educate audience about industry topics and solutions'
    );
    expect(resolveGoal('Weekly Roundup')).toBe('Increase audience engagement and interaction');
  });

  it('formats captions per platform', () => {
    expect(formatCaption('One. Two. Three.', 'Instagram')).toBe('One.\n\nTwo.\n\nThree.');
    expect(formatCaption('One. Two. Three.', 'LinkedIn')).toBe('One. Two. Three.');
  });

  it('cycles platforms across days', () => {
    expect(platformForDay(['Facebook', 'LinkedIn'], 3)).toBe('Facebook');
    expect(platformForDay(['Facebook', 'LinkedIn'], 4)).toBe('LinkedIn');
  });

  it('picks the first recommended type the platform allows', () => {
    expect(choosePostType(['Polls', 'Video'], ['Poll', 'Video'])).toBe('Video');
    expect(choosePostType(['Reels'], ['Feed Post', 'IGTV'])).toBe('Feed Post');
    expect(choosePostType([], [])).toBe('Image Post');
  });
});

describe('planDailyPosts', () => {
  const plan = (days?: readonly DayNumber[]) => {
    const store = createStrategyStore();
    const result = planDailyPosts(store, {
      seed: 7,
      clock: fixedClock,
      weekStart: WEEK_OF_JAN_8,
      days,
    });
    return { store, result };
  };

  it('generates the whole week in Monday-start order', () => {
    const { store, result } = plan();

    expect(result.status).toBe('success');
    const posts = result.status === 'success' ? result.data : [];
    expect(posts.map((post) => post.dayName)).toEqual([...WEEKDAYS]);
    expect(posts.map((post) => post.scheduledDate)).toEqual([
      '2024-01-08',
      '2024-01-09',
      '2024-01-10',
      '2024-01-11',
      '2024-01-12',
      '2024-01-13',
      '2024-01-14',
    ]);
    expect(store.has('post:7')).toBe(true);
    expect(store.has('contentTypes:7')).toBe(true);
  });

  it('follows the weekly structure and platform rotation', () => {
    const { result } = plan();
    const posts = result.status === 'success' ? result.data : [];

    expect(posts.map((post) => post.platform)).toEqual([
      'Instagram',
      'LinkedIn',
      'Instagram',
      'LinkedIn',
      'Instagram',
      'LinkedIn',
      'Instagram',
    ]);
    expect(posts.map((post) => post.contentTheme)).toEqual([
      'Educational Content',
      'Behind-the-Scenes',
      'Problem-Solution',
      'Innovation & Trends',
      'Educational Content',
      'Behind-the-Scenes',
      'Problem-Solution',
    ]);
    expect(posts.map((post) => post.postType)).toEqual([
      'Feed Post',
      'Video',
      'Feed Post',
      'Video',
      'Feed Post',
      'Video',
      'Feed Post',
    ]);
  });

  it('is reproducible and days are independent of each other', () => {
    const full = plan().result;
    const again = plan().result;
    const single = plan([3]).result;

    expect(full).toEqual(again);
    const fullDay3 = full.status === 'success' ? full.data[2] : undefined;
    const singleDay3 = single.status === 'success' ? single.data[0] : undefined;
    expect(singleDay3).toEqual(fullDay3);
  });
});
