// Query parameters that identify a view, a session or a tracking source
// rather than the resource itself.
const VOLATILE_PARAMS = new Set([
  'v',
  'view',
  'tab',
  'session',
  'session_id',
  'sessionid',
  'sid',
  'ref',
  'ref_src',
  'fbclid',
  'gclid',
  'mc_cid',
  'mc_eid',
  '_ga',
]);

function isVolatile(param: string): boolean {
  const p = param.toLowerCase();
  return VOLATILE_PARAMS.has(p) || p.startsWith('utm_');
}

/**
 * Collapses URLs that point at the same resource: lower-cased host, no
 * fragment, no volatile query parameters, no trailing slash on a non-root
 * path. Input that is not an absolute URL comes back trimmed.
 */
export function normalizeUrl(raw: string): string {
  const input = raw.trim();
  let u: URL;
  try {
    u = new URL(input);
  } catch {
    return input;
  }
  u.hash = '';
  for (const key of [...u.searchParams.keys()]) {
    if (isVolatile(key)) u.searchParams.delete(key);
  }
  if (u.pathname.length > 1 && u.pathname.endsWith('/'))
    u.pathname = u.pathname.replace(/\/+$/, '') || '/';
  const query = u.searchParams.toString();
  const path = u.pathname === '/' && !query ? '' : u.pathname;
  return `${u.protocol}//${u.host}${path}${query ? `?${query}` : ''}`;
}
