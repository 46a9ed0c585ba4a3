import { describe, expect, it } from 'vitest';
import { renderDigestText } from '../text.js';
import { titleCase, topicLabel } from '../sections.js';

describe('renderDigestText', () => {
  it('renders every section as plain text', () => {
    const text = renderDigestText(
      [
        {
          timestamp: new Date('2024-05-01T09:05:00.000Z'),
          title: 'Oil climbs',
          url: '/business/oil',
          summary: 'Brent up',
        },
      ],
      new Map([['energy', ['oil']]]),
      {
        origin: 'https://www.reuters.com',
        timeZone: 'UTC',
        generatedAt: new Date('2024-05-01T20:00:00.000Z'),
      }
    );

    const entry = ['- [9:05 AM] Oil climbs', '  https://www.reuters.com/business/oil', '  Brent up'];
    expect(text).toBe(
      [
        'Daily News Digest — May 01, 2024',
        '',
        'Top 3 Trending Articles',
        ...entry,
        '',
        'Top 3 Trending Articles (By Hotness Score)',
        ...entry,
        '',
        'Energy (1 article)',
        ...entry,
        '',
      ].join('\n')
    );
  });
});

describe('topic labels', () => {
  it('title-cases every word', () => {
    expect(titleCase('world politics')).toBe('World Politics');
    expect(titleCase('AI & tech')).toBe('Ai & Tech');
    expect(titleCase("world's markets")).toBe("World'S Markets");
  });

  it('pluralizes the article count', () => {
    expect(topicLabel('energy', 1)).toBe('Energy (1 article)');
    expect(topicLabel('energy', 4)).toBe('Energy (4 articles)');
  });
});
