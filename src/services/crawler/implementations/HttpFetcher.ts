import axios from 'axios';
import { IFetcher } from '../interfaces/IFetcher';
import { ILinkExtractor } from '../interfaces/ILinkExtractor';
import { CrawlKey, FetchResult, HttpFetcherOptions } from '../interfaces/types';
import { FetchNotFoundError, FetchTransportError, toError } from '../errors';
import { HtmlLinkExtractor } from './HtmlLinkExtractor';
import { DelayUtils } from '../utils/DelayUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';

const NOT_FOUND_STATUSES = new Set([404, 410]);

/**
 * Fetcher that retrieves pages over HTTP with axios and extracts their links.
 * Transport failures are retried with exponential backoff; missing pages are not.
 */
export class HttpFetcher implements IFetcher {
  private readonly options: Required<HttpFetcherOptions>;
  private readonly logger = LoggingUtils.createTaggedLogger('http');

  constructor(
    options: HttpFetcherOptions = {},
    private readonly linkExtractor: ILinkExtractor = new HtmlLinkExtractor()
  ) {
    this.options = {
      userAgent: 'depth-crawler/0.1',
      timeout: 10000,
      maxRedirects: 5,
      maxRetries: 2,
      retryDelay: 500,
      sameDomainOnly: true,
      ...options
    };
  }

  async fetch(url: CrawlKey): Promise<FetchResult> {
    if (!UrlUtils.isHttpUrl(url)) {
      throw new FetchNotFoundError(url);
    }

    return DelayUtils.withRetry(
      () => this.fetchOnce(url),
      this.options.maxRetries,
      this.options.retryDelay,
      error => error instanceof FetchTransportError
    );
  }

  private async fetchOnce(url: CrawlKey): Promise<FetchResult> {
    const startTime = Date.now();
    this.logger.debug(`GET ${url}`);

    const response = await axios
      .get<string>(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          'Accept': 'text/html,application/xhtml+xml',
        },
        timeout: this.options.timeout,
        maxRedirects: this.options.maxRedirects,
        responseType: 'text',
        validateStatus: () => true,
      })
      .catch((error: unknown) => {
        const cause = toError(error);
        throw new FetchTransportError(url, cause.message, { cause });
      });

    if (NOT_FOUND_STATUSES.has(response.status)) {
      throw new FetchNotFoundError(url);
    }
    if (response.status >= 400) {
      throw new FetchTransportError(url, `HTTP ${response.status}`, { statusCode: response.status });
    }

    const content = typeof response.data === 'string' ? response.data : String(response.data);
    const pageUrl = finalUrl(response.request, url);
    const links = this.linkExtractor.extractLinks(content, pageUrl, this.options.sameDomainOnly);

    this.logger.debug(`Fetched ${url} in ${Date.now() - startTime}ms (${links.length} links)`);
    return { content, links };
  }
}

/**
 * URL the response was served from after redirects, as recorded on the
 * node request axios made
 */
function finalUrl(request: unknown, requestedUrl: CrawlKey): string {
  if (typeof request === 'object' && request !== null && 'res' in request) {
    const { res } = request;
    if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
      return res.responseUrl;
    }
  }
  return requestedUrl;
}
