/**
 * Domain allow-list for ingestion.
 */

import { ALLOWED_DOMAINS } from '@/lib/rag/config';

/**
 * True when the URL's host is an allowed domain or a sub-domain of one.
 * Matching is on the parsed host only, never on the path.
 */
export function checkDomainAllowed(
  url: string,
  allowedDomains: readonly string[] = ALLOWED_DOMAINS
): boolean {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }

  return allowedDomains.some((domain) => host === domain || host.endsWith(`.${domain}`));
}
