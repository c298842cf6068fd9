/**
 * Extract domain from URL
 *
 * @param url - URL to extract domain from
 * @returns Domain (e.g., "www.webtoons.com")
 */
export function extractDomain(url: string): string {
  try {
    const urlObj = new URL(url);
    return urlObj.hostname;
  } catch {
    throw new Error(`Invalid URL: "${url}"`);
  }
}

/**
 * Check if URL is valid
 *
 * @param url - URL to validate
 * @returns True if URL is valid
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a possibly relative link against the page it was found on
 */
export function absoluteUrl(link: string, base: string): string {
  return new URL(link, base).toString();
}
