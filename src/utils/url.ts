const TRACKING_PARAMS = /^(utm_[a-z]+|fbclid|gclid|mc_cid|mc_eid|ref|ref_src)$/i;

function parseUrl(raw: string): URL | null {
  let cleaned = raw.trim();
  if (!cleaned) {
    return null;
  }
  if (!cleaned.startsWith('http://') && !cleaned.startsWith('https://')) {
    cleaned = `https://${cleaned}`;
  }
  try {
    return new URL(cleaned);
  } catch {
    return null;
  }
}

/** Lower-cased host without a leading `www.`, or null for an unparseable URL. */
export function hostOf(raw: string): string | null {
  const url = parseUrl(raw);
  return url ? url.hostname.toLowerCase().replace(/^www\./, '') : null;
}

/**
 * Scheme-less canonical URL used as an evidence dedupe key: no fragment, no
 * tracking parameters, sorted query, no trailing slash.
 */
export function normalizeUrl(raw: string): string | null {
  const url = parseUrl(raw);
  if (!url) {
    return null;
  }
  for (const key of [...url.searchParams.keys()]) {
    if (TRACKING_PARAMS.test(key)) {
      url.searchParams.delete(key);
    }
  }
  url.searchParams.sort();
  const host = url.hostname.toLowerCase().replace(/^www\./, '');
  const port = url.port ? `:${url.port}` : '';
  const path = url.pathname.replace(/\/+$/, '');
  const query = url.searchParams.toString();
  return `${host}${port}${path}${query ? `?${query}` : ''}`;
}
