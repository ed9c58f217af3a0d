import { HtmlLinkExtractor } from '../HtmlLinkExtractor';

const PAGE_URL = 'https://example.com/docs/index.html';

const html = `
  <html>
    <body>
      <a href="/pkg/">Packages</a>
      <a href="/cmd/#section">Commands</a>
      <a href="page2">Next</a>
      <a href="https://other.org/page">Elsewhere</a>
      <a href="mailto:team@example.com">Mail</a>
      <a href="javascript:void(0)">Script</a>
      <a href="#top">Top</a>
      <a href="ftp://example.com/file.txt">File</a>
      <a href="/pkg/">Packages again</a>
      <a>No target</a>
    </body>
  </html>
`;

describe('HtmlLinkExtractor', () => {
  let extractor: HtmlLinkExtractor;

  beforeEach(() => {
    extractor = new HtmlLinkExtractor();
  });

  it('should resolve, normalize and dedupe links in document order', () => {
    expect(extractor.extractLinks(html, PAGE_URL)).toEqual([
      'https://example.com/pkg/',
      'https://example.com/cmd/',
      'https://example.com/docs/page2',
      'https://other.org/page'
    ]);
  });

  it('should keep only same-domain links when asked', () => {
    expect(extractor.extractLinks(html, PAGE_URL, true)).toEqual([
      'https://example.com/pkg/',
      'https://example.com/cmd/',
      'https://example.com/docs/page2'
    ]);
  });

  it('should return no links for a page without anchors', () => {
    expect(extractor.extractLinks('<p>Nothing here</p>', PAGE_URL)).toEqual([]);
  });
});
