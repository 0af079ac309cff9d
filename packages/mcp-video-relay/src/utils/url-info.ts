/**
 * URL discovery and allowlist matching for incoming chat messages.
 */

const URL_PATTERN = /https?:\/\/[^\s<>"'`]+/gi;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}]+$/;

export type UrlsFound =
  | { kind: 'none' }
  | { kind: 'multiple' }
  | { kind: 'one'; url: string; supported: boolean };

/** All http(s) URLs in a message, in order, without trailing sentence punctuation. */
export function findUrls(text: string): string[] {
  const matches = text.match(URL_PATTERN) ?? [];
  return matches
    .map((m) => m.replace(TRAILING_PUNCTUATION, ''))
    .filter((m) => {
      try {
        return new URL(m).hostname.length > 0;
      } catch {
        return false;
      }
    });
}

/** www.youtube.com → youtube.com; vm.tiktok.com → tiktok.com */
export function registrableDomain(hostname: string): string {
  return hostname.toLowerCase().replace(/\.$/, '').split('.').slice(-2).join('.');
}

export function isAllowlisted(url: string, allowlist: readonly string[]): boolean {
  try {
    return allowlist.includes(registrableDomain(new URL(url).hostname));
  } catch {
    return false;
  }
}

export function classifyUrls(text: string, allowlist: readonly string[]): UrlsFound {
  const urls = findUrls(text);
  if (urls.length === 0) return { kind: 'none' };
  if (urls.length > 1) return { kind: 'multiple' };
  return { kind: 'one', url: urls[0], supported: isAllowlisted(urls[0], allowlist) };
}
