import { URL } from 'url';

/**
 * Utilities for handling URLs in the crawler service
 */
export class UrlUtils {
  /**
   * Normalizes a URL for use as a crawl key: the fragment is dropped and the
   * scheme and host are lower-cased. Trailing slashes are kept because
   * `/pkg` and `/pkg/` are distinct keys.
   * @param url The URL to normalize
   * @returns The normalized URL, or the input when it cannot be parsed
   */
  static normalize(url: string): string {
    try {
      const parsedUrl = new URL(url);
      parsedUrl.hash = '';
      return parsedUrl.toString();
    } catch (error) {
      return url;
    }
  }

  /**
   * Extracts the host name from a URL
   * @returns The host name, or null if the URL is invalid
   */
  static extractDomain(url: string): string | null {
    try {
      return new URL(url).hostname;
    } catch (error) {
      return null;
    }
  }

  /**
   * Whether a URL uses a scheme the HTTP fetcher can retrieve
   */
  static isHttpUrl(url: string): boolean {
    try {
      const { protocol } = new URL(url);
      return protocol === 'http:' || protocol === 'https:';
    } catch (error) {
      return false;
    }
  }

  /**
   * Resolves a relative URL against a base URL
   * @returns The absolute URL, or null when it cannot be resolved
   */
  static resolveUrl(relativeUrl: string, baseUrl: string): string | null {
    try {
      return new URL(relativeUrl, baseUrl).toString();
    } catch (error) {
      return null;
    }
  }

  static isSameDomain(url: string, baseUrl: string): boolean {
    const urlDomain = this.extractDomain(url);
    return urlDomain !== null && urlDomain === this.extractDomain(baseUrl);
  }
}
