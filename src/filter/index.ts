/**
 * Filter Module
 *
 * Keyword matching used for topic buckets and hotness scoring
 */

export { countOccurrences, keywordScore, matchesAnyKeyword, filterByKeywords } from './matcher.js';
