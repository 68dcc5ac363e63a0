import { normalizeUrl } from './url-normalizer';

describe('normalizeUrl', () => {
  it('drops view and tracking parameters', () => {
    expect(normalizeUrl('https://notion.so/page-abc?v=1')).toBe('https://notion.so/page-abc');
    expect(normalizeUrl('https://github.com/user/repo/pull/123?tab=files')).toBe(
      'https://github.com/user/repo/pull/123',
    );
    expect(
      normalizeUrl('https://example.com/a?utm_source=x&id=7&fbclid=abc'),
    ).toBe('https://example.com/a?id=7');
  });

  it('lower-cases the host and drops the fragment and trailing slash', () => {
    expect(normalizeUrl('https://Example.COM/Docs/#intro')).toBe('https://example.com/Docs');
  });

  it('renders a bare host without a path', () => {
    expect(normalizeUrl('https://mail.google.com/')).toBe('https://mail.google.com');
  });

  it('returns unparsable input trimmed', () => {
    expect(normalizeUrl('  not a url ')).toBe('not a url');
  });
});
