import { analyzeDomainContext, normalizeHost } from './domain-context.analyzer';
import { makeMeta } from '../testing/fixtures';

describe('analyzeDomainContext', () => {
  it('treats a recently used productivity tool leniently', () => {
    const ctx = analyzeDomainContext(
      'mail.google.com',
      'https://mail.google.com/mail/u/0',
      makeMeta({ days_since_last_activity: 0.5 }),
    );
    expect(ctx.domain_type).toBe('productivity_tool');
    expect(ctx.should_apply_lenient_rules).toBe(true);
    expect(ctx.should_apply_strict_rules).toBe(false);
    expect(ctx.context_notes).toEqual([
      'Productivity tool with recent activity - likely intentional',
    ]);
  });

  it('drops leniency for an idle productivity tool', () => {
    const ctx = analyzeDomainContext(
      'notion.so',
      'https://notion.so/page',
      makeMeta({ days_since_last_activity: 3 }),
    );
    expect(ctx.domain_type).toBe('productivity_tool');
    expect(ctx.should_apply_lenient_rules).toBe(false);
    expect(ctx.should_apply_strict_rules).toBe(false);
  });

  it('is strict for a content site visited once', () => {
    const ctx = analyzeDomainContext(
      'www.medium.com',
      'https://www.medium.com/@a/post',
      makeMeta(),
    );
    expect(ctx.domain_type).toBe('content_site');
    expect(ctx.should_apply_strict_rules).toBe(true);
    expect(ctx.context_notes).toEqual([
      'Content site visited once - classic read-later pattern',
    ]);
  });

  it('is lenient for pull requests and issues', () => {
    const pr = analyzeDomainContext(
      'github.com',
      'https://github.com/org/repo/pull/12',
      makeMeta(),
    );
    expect(pr.domain_type).toBe('code_platform');
    expect(pr.should_apply_lenient_rules).toBe(true);
    expect(pr.context_notes).toEqual(['Active work in progress (pull request or issue)']);
  });

  it('is strict for a repository opened once or twice', () => {
    const once = analyzeDomainContext(
      'github.com',
      'https://github.com/org/repo',
      makeMeta({ visit_count: 2, is_single_visit: false }),
    );
    expect(once.should_apply_strict_rules).toBe(true);
    const often = analyzeDomainContext(
      'github.com',
      'https://github.com/org/repo',
      makeMeta({ visit_count: 5, is_single_visit: false }),
    );
    expect(often.should_apply_strict_rules).toBe(false);
    expect(often.should_apply_lenient_rules).toBe(false);
  });

  it('distinguishes revisited and unread documentation', () => {
    const ref = analyzeDomainContext(
      'docs.python.org',
      'https://docs.python.org/3/library/json.html',
      makeMeta({ visit_count: 2, is_single_visit: false }),
    );
    expect(ref.domain_type).toBe('documentation');
    expect(ref.should_apply_lenient_rules).toBe(true);
    const unread = analyzeDomainContext('stackoverflow.com', 'https://stackoverflow.com/q/1', makeMeta());
    expect(unread.domain_type).toBe('documentation');
    expect(unread.should_apply_strict_rules).toBe(true);
  });

  it('falls back to general scoring', () => {
    const ctx = analyzeDomainContext('example.org', 'https://example.org/', makeMeta());
    expect(ctx).toEqual({
      domain_type: 'general',
      should_apply_strict_rules: false,
      should_apply_lenient_rules: false,
      context_notes: ['General website - default scoring'],
    });
  });

  it('reads the host from the url when the domain is missing', () => {
    expect(normalizeHost('', 'https://WWW.Reddit.com/r/x')).toBe('reddit.com');
    const ctx = analyzeDomainContext('', 'https://old.reddit.com/r/x', makeMeta());
    expect(ctx.domain_type).toBe('content_site');
  });

  it('never sets strict and lenient together', () => {
    for (const visit_count of [1, 2, 3, 10])
      for (const idle of [0, 0.5, 2, 10])
        for (const [domain, url] of [
          ['github.com', 'https://github.com/a/b/issues/1'],
          ['docs.rs', 'https://docs.rs/x'],
          ['slack.com', 'https://slack.com/'],
          ['youtube.com', 'https://youtube.com/watch'],
        ]) {
          const ctx = analyzeDomainContext(
            domain,
            url,
            makeMeta({
              visit_count,
              is_single_visit: visit_count === 1,
              days_since_last_activity: idle,
            }),
          );
          expect(ctx.should_apply_strict_rules && ctx.should_apply_lenient_rules).toBe(false);
        }
  });
});
