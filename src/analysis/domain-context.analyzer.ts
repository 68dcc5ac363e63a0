import { DomainContext, DomainType, TabMetadata } from '../shared/types';

export const PRODUCTIVITY_TOOLS = [
  'mail.google.com',
  'gmail.com',
  'calendar.google.com',
  'outlook.com',
  'outlook.live.com',
  'notion.so',
  'slack.com',
  'discord.com',
  'teams.microsoft.com',
  'todoist.com',
  'trello.com',
  'asana.com',
  'linear.app',
  'figma.com',
  'miro.com',
];

export const CONTENT_SITES = [
  'medium.com',
  'dev.to',
  'substack.com',
  'news.ycombinator.com',
  'reddit.com',
  'twitter.com',
  'x.com',
  'youtube.com',
  'vimeo.com',
  'instagram.com',
];

export const CODE_PLATFORMS = ['github.com', 'gitlab.com', 'bitbucket.org'];

export const DOCUMENTATION_SITES = ['stackoverflow.com', 'readthedocs.io'];
export const DOCUMENTATION_PREFIXES = ['docs.', 'developer.', 'api.'];

const ACTIVE_WORK_PATH =
  /\/(?:pull|issues|commits|compare|merge_requests)\/|\/pulls(?:[/?#]|$)/;

// single or occasional visit to a repository page
const OCCASIONAL_REPO_VISITS = 2;

export function normalizeHost(domain: string, url: string): string {
  let host = domain.trim().toLowerCase();
  if (!host) {
    try {
      host = new URL(url).hostname.toLowerCase();
    } catch {
      return '';
    }
  }
  return host.startsWith('www.') ? host.slice(4) : host;
}

export function matchesDomain(host: string, list: readonly string[]): boolean {
  return list.some((d) => host === d || host.endsWith(`.${d}`));
}

function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}

type Rule = {
  type: DomainType;
  matches: (host: string) => boolean;
  decide: (
    meta: TabMetadata,
    url: string,
  ) => { strict: boolean; lenient: boolean; note: string };
};

const RULES: Rule[] = [
  {
    type: 'productivity_tool',
    matches: (h) => matchesDomain(h, PRODUCTIVITY_TOOLS),
    decide: (m) =>
      m.days_since_last_activity < 1
        ? {
            strict: false,
            lenient: true,
            note: 'Productivity tool with recent activity - likely intentional',
          }
        : {
            strict: false,
            lenient: false,
            note: 'Productivity tool with no recent activity - possible forgotten tab',
          },
  },
  {
    type: 'content_site',
    matches: (h) => matchesDomain(h, CONTENT_SITES),
    decide: (m) =>
      m.is_single_visit
        ? {
            strict: true,
            lenient: false,
            note: 'Content site visited once - classic read-later pattern',
          }
        : {
            strict: false,
            lenient: false,
            note: 'Content site revisited - likely being consumed',
          },
  },
  {
    type: 'code_platform',
    matches: (h) => matchesDomain(h, CODE_PLATFORMS),
    decide: (m, url) => {
      if (ACTIVE_WORK_PATH.test(pathOf(url)))
        return {
          strict: false,
          lenient: true,
          note: 'Active work in progress (pull request or issue)',
        };
      if (m.visit_count <= OCCASIONAL_REPO_VISITS)
        return {
          strict: true,
          lenient: false,
          note: 'Repository opened once or twice - potential hoarder',
        };
      return {
        strict: false,
        lenient: false,
        note: 'Repository revisited regularly - likely an active project',
      };
    },
  },
  {
    type: 'documentation',
    matches: (h) =>
      matchesDomain(h, DOCUMENTATION_SITES) ||
      DOCUMENTATION_PREFIXES.some((p) => h.startsWith(p)),
    decide: (m) => {
      if (m.visit_count > 1)
        return {
          strict: false,
          lenient: true,
          note: 'Frequently revisited documentation - likely a reference',
        };
      return {
        strict: m.is_single_visit,
        lenient: false,
        note: 'Documentation visited once - possible unread article',
      };
    },
  },
];

/**
 * Picks the heuristics family for a resource. Rules are tried in order and
 * the first matching domain list decides; strict and lenient are never both set.
 */
export function analyzeDomainContext(
  domain: string,
  url: string,
  meta: TabMetadata,
): DomainContext {
  const host = normalizeHost(domain, url);
  const rule = RULES.find((r) => r.matches(host));
  if (!rule)
    return {
      domain_type: 'general',
      should_apply_strict_rules: false,
      should_apply_lenient_rules: false,
      context_notes: ['General website - default scoring'],
    };
  const d = rule.decide(meta, url);
  return {
    domain_type: rule.type,
    should_apply_strict_rules: d.strict,
    should_apply_lenient_rules: d.lenient && !d.strict,
    context_notes: [d.note],
  };
}
