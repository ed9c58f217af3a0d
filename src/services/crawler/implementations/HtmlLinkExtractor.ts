import * as cheerio from 'cheerio';
import { ILinkExtractor } from '../interfaces/ILinkExtractor';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

const SKIPPED_PREFIXES = ['javascript:', 'mailto:', 'tel:', '#'];

/**
 * Link extractor for HTML pages, backed by cheerio
 */
export class HtmlLinkExtractor implements ILinkExtractor {
  private readonly logger = LoggingUtils.createTaggedLogger('fetcher');

  extractLinks(htmlContent: string, pageUrl: string, sameDomainOnly = false): string[] {
    const $ = cheerio.load(htmlContent);
    const links = new Set<string>();

    $('a[href]').each((_, element) => {
      const href = $(element).attr('href')?.trim();
      if (!href || SKIPPED_PREFIXES.some(prefix => href.startsWith(prefix))) {
        return;
      }

      const resolvedUrl = UrlUtils.resolveUrl(href, pageUrl);
      if (!resolvedUrl || !UrlUtils.isHttpUrl(resolvedUrl)) {
        this.logger.debug(`Skipping unsupported link: ${href}`);
        return;
      }

      const normalizedUrl = UrlUtils.normalize(resolvedUrl);
      if (sameDomainOnly && !UrlUtils.isSameDomain(normalizedUrl, pageUrl)) {
        return;
      }

      links.add(normalizedUrl);
    });

    return [...links];
  }
}
