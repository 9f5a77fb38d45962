const SUBDOMAIN_PREFIXES = ['jobs', 'careers', 'www'];

export function ensureScheme(input: string): string {
  const trimmed = input.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export function parseUrl(input: string): URL | null {
  try {
    return new URL(ensureScheme(input));
  } catch {
    return null;
  }
}

/**
 * "https://www.Acme.io/about" -> "acme.io"
 */
export function cleanDomain(input: string): string {
  const parsed = parseUrl(input);
  const host = parsed
    ? parsed.hostname
    : input.replace(/^https?:\/\//i, '').split('/')[0].toLowerCase();
  return host.replace(/^www\./, '').trim();
}

/**
 * "jobs.primary.vc" -> "primary.vc"
 */
export function rootDomain(domain: string): string {
  const parts = domain.split('.');
  if (parts.length > 2 && SUBDOMAIN_PREFIXES.includes(parts[0])) {
    return parts.slice(1).join('.');
  }
  return domain;
}

/**
 * Scheme and host of the given website, without trailing slash
 */
export function siteOrigin(website: string): string {
  const parsed = parseUrl(website);
  return parsed ? parsed.origin : `https://${cleanDomain(website)}`;
}

export function resolveHref(base: string, href: string): string | null {
  try {
    return new URL(href, ensureScheme(base)).toString();
  } catch {
    return null;
  }
}
