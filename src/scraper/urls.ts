const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;
const REJECTED_SCHEMES = /^(javascript|mailto|tel|data):/i;
const BARE_SCHEME = /^[a-z][a-z0-9+.-]*:$/i;

/**
 * Normalize a feed link to the canonical form used as a post identifier:
 * absolute, without query string or fragment, without trailing slash.
 * Returns null for links that cannot address a page (empty, fragment-only,
 * javascript:/mailto: and friends).
 */
export const canonicalizePostUrl = (href: string, baseUrl: string): string | null => {
  const raw = href.trim();
  if (!raw || raw.startsWith('#') || REJECTED_SCHEMES.test(raw)) {
    return null;
  }

  const base = baseUrl.replace(/\/+$/, '');
  let absolute: string;
  if (ABSOLUTE_URL.test(raw)) {
    absolute = raw;
  } else if (raw.startsWith('//')) {
    absolute = `${base.split('//')[0]}${raw}`;
  } else {
    absolute = `${base}/${raw.replace(/^\/+/, '')}`;
  }

  const withoutQuery = absolute.split(/[?#]/)[0];
  const canonical = withoutQuery.replace(/\/+$/, '');
  // Nothing after `scheme://`
  if (!canonical || BARE_SCHEME.test(canonical)) {
    return null;
  }
  return canonical;
};

export const accountFeedUrl = (baseUrl: string, account: string): string =>
  `${baseUrl.replace(/\/+$/, '')}/${account}/`;
