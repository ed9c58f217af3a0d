/**
 * Interface for link extraction.
 * Implementations find anchors in HTML content and return normalized,
 * absolute, de-duplicated URLs.
 */
export interface ILinkExtractor {
  /**
   * Extract all links from HTML content
   * @param htmlContent The HTML content to extract links from
   * @param pageUrl URL of the page, used to resolve relative links
   * @param sameDomainOnly Keep only links on the page's host
   * @returns Array of normalized absolute URLs in document order
   */
  extractLinks(htmlContent: string, pageUrl: string, sameDomainOnly?: boolean): string[];
}
