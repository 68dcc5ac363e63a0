import { matchesDomain, normalizeHost } from './domain-context.analyzer';

export type ContentType =
  | 'documentation'
  | 'article'
  | 'code_review'
  | 'issue_tracker'
  | 'social_media'
  | 'search_results'
  | 'news_feed'
  | 'unknown';

const CONTENT_WEIGHTS: Record<ContentType, number> = {
  documentation: 1.5,
  article: 1.5,
  code_review: 1.2,
  issue_tracker: 1.1,
  unknown: 1.0,
  search_results: 0.7,
  social_media: 0.6,
  news_feed: 0.6,
};

// checked oldest first
const AGE_WEIGHTS: Array<{ min: number; multiplier: number }> = [
  { min: 7, multiplier: 1.5 },
  { min: 5, multiplier: 1.3 },
  { min: 3, multiplier: 1.0 },
  { min: 1, multiplier: 0.7 },
];
const FRESH_TAB_MULTIPLIER = 0.5;

const SOCIAL = [
  'twitter.com',
  'x.com',
  'facebook.com',
  'instagram.com',
  'linkedin.com',
  'tiktok.com',
  'reddit.com',
];
const SEARCH = ['google.com', 'bing.com', 'duckduckgo.com'];
const NEWS = ['nytimes.com', 'cnn.com', 'bbc.com', 'bbc.co.uk', 'news.ycombinator.com'];
const CODE = ['github.com', 'gitlab.com'];
const ARTICLE_HOSTS = ['medium.com', 'dev.to', 'substack.com'];

export interface RankableTab {
  url: string;
  domain: string;
  score: number;
  tab_age_days: number;
}

export interface ValueBreakdown {
  base_score: number;
  age_weight: number;
  content_weight: number;
  final_value: number;
}

export function classifyContentType(domain: string, url: string): ContentType {
  const host = normalizeHost(domain, url);
  if (
    /^(docs|developer|api)\./.test(host) ||
    matchesDomain(host, ['stackoverflow.com', 'readthedocs.io'])
  )
    return 'documentation';
  if (
    matchesDomain(host, ARTICLE_HOSTS) ||
    host.startsWith('blog.') ||
    /\/(blog|article|post|tutorial)s?\//.test(url)
  )
    return 'article';
  if (matchesDomain(host, CODE)) {
    if (/\/(pull|merge_requests)\//.test(url)) return 'code_review';
    if (url.includes('/issues/')) return 'issue_tracker';
  }
  if (matchesDomain(host, SOCIAL)) return 'social_media';
  if (matchesDomain(host, SEARCH) && !host.startsWith('mail.'))
    return 'search_results';
  if (matchesDomain(host, NEWS) || host.startsWith('news.')) return 'news_feed';
  return 'unknown';
}

export function ageWeight(ageDays: number): number {
  const hit = AGE_WEIGHTS.find((w) => ageDays >= w.min);
  return hit ? hit.multiplier : FRESH_TAB_MULTIPLIER;
}

/**
 * Orders hoarder tabs by how much they are probably worth getting back to:
 * old unread articles and docs rise, stale search pages and feeds sink.
 */
export function rankByValue<T extends RankableTab>(
  tabs: readonly T[],
): Array<T & { value_rank: number; value_breakdown: ValueBreakdown }> {
  return tabs
    .map((tab) => {
      const age = ageWeight(tab.tab_age_days);
      const content = CONTENT_WEIGHTS[classifyContentType(tab.domain, tab.url)];
      const value = Math.round(tab.score * age * content * 100) / 100;
      return {
        ...tab,
        value_rank: value,
        value_breakdown: {
          base_score: tab.score,
          age_weight: age,
          content_weight: content,
          final_value: value,
        },
      };
    })
    .sort((a, b) => b.value_rank - a.value_rank);
}
