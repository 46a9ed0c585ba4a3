import { describe, expect, it } from 'vitest';
import { collectKeywords, rankByHotness, rankByRecency, recencyScores, scoreArticles } from '../index.js';
import type { Article } from '../../types/index.js';

const T0 = new Date('2024-05-01T08:00:00.000Z').getTime();
const HOUR = 60 * 60 * 1000;

function article(title: string, offsetHours: number, summary = ''): Article {
  return {
    timestamp: new Date(T0 + offsetHours * HOUR),
    title,
    url: `https://www.reuters.com/${encodeURIComponent(title)}`,
    summary,
  };
}

describe('recencyScores', () => {
  it('scales linearly from oldest (0) to newest (1)', () => {
    expect(recencyScores([article('a', 2), article('b', 0), article('c', 1), article('d', 4)])).toEqual([
      0.5, 0, 0.25, 1,
    ]);
  });

  it('gives every article 1.0 when they share one instant', () => {
    expect(recencyScores([article('a', 3), article('b', 3)])).toEqual([1, 1]);
    expect(recencyScores([article('only', 7)])).toEqual([1]);
  });

  it('stays within [0, 1] with the newest at 1.0', () => {
    const scores = recencyScores([article('a', 5), article('b', 1.5), article('c', 9), article('d', 2)]);
    for (const score of scores) {
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
    expect(scores[2]).toBe(1);
  });

  it('is empty for no articles', () => {
    expect(recencyScores([])).toEqual([]);
  });
});

describe('rankByRecency', () => {
  it('orders newest first and truncates', () => {
    const ranked = rankByRecency([article('old', 0), article('new', 5), article('mid', 2)], 2);
    expect(ranked.map((a) => a.title)).toEqual(['new', 'mid']);
  });

  it('keeps input order for equal timestamps', () => {
    const ranked = rankByRecency([article('first', 1), article('second', 1), article('third', 1)], 3);
    expect(ranked.map((a) => a.title)).toEqual(['first', 'second', 'third']);
  });
});

describe('rankByHotness', () => {
  it('drops the oldest article even with the most keyword hits', () => {
    const articles = [
      article('oil oil oil oil oil', 0),
      article('oil', 1),
      article('oil', 2),
    ];

    const ranked = rankByHotness(articles, ['oil'], 3);

    expect(ranked.map((a) => a.timestamp.getTime())).toEqual([T0 + 2 * HOUR, T0 + HOUR]);
    expect(ranked.map((a) => a.hotness)).toEqual([1, 0.5]);
  });

  it('lets an older article with many hits outrank a newer one with few', () => {
    const articles = [
      article('Election recap', 0),
      article('oil oil oil', 1),
      article('oil rebounds', 2),
    ];

    const scored = scoreArticles(articles, ['oil']);
    expect(scored.map((a) => [a.recencyScore, a.keywordScore, a.hotness])).toEqual([
      [0, 0, 0],
      [0.5, 3, 1.5],
      [1, 1, 1],
    ]);
    expect(rankByHotness(articles, ['oil'], 3).map((a) => a.title)).toEqual(['oil oil oil', 'oil rebounds']);
  });

  it('counts summary hits alongside the title', () => {
    const articles = [article('Markets', 0), article('Energy update', 1, 'Oil and more oil')];
    const [top] = rankByHotness(articles, ['oil'], 1);
    expect(top?.keywordScore).toBe(2);
    expect(top?.hotness).toBe(2);
  });

  it('breaks ties by input order', () => {
    const articles = [article('oil a', 4), article('oil b', 4), article('oil c', 4)];
    expect(rankByHotness(articles, ['oil'], 2).map((a) => a.title)).toEqual(['oil a', 'oil b']);
  });

  it('produces nothing for an empty set', () => {
    expect(rankByHotness([], ['oil'], 3)).toEqual([]);
  });
});

describe('collectKeywords', () => {
  it('joins every topic keyword in topic order', () => {
    const topics = new Map([
      ['energy', ['oil', 'opec']],
      ['politics', ['election']],
    ]);
    expect(collectKeywords(topics)).toEqual(['oil', 'opec', 'election']);
  });
});
