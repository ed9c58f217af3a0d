import { UrlUtils } from '../UrlUtils';

describe('UrlUtils', () => {
  describe('normalize', () => {
    it('should drop the fragment and keep the trailing slash', () => {
      expect(UrlUtils.normalize('https://Example.com/pkg/#top')).toBe('https://example.com/pkg/');
      expect(UrlUtils.normalize('https://example.com/pkg')).toBe('https://example.com/pkg');
    });

    it('should return unparseable input unchanged', () => {
      expect(UrlUtils.normalize('not a url')).toBe('not a url');
    });
  });

  it('should resolve relative links against the page', () => {
    expect(UrlUtils.resolveUrl('../cmd/', 'https://example.com/pkg/fmt/')).toBe('https://example.com/pkg/cmd/');
    expect(UrlUtils.resolveUrl('/cmd/', 'https://example.com/pkg/fmt/')).toBe('https://example.com/cmd/');
    expect(UrlUtils.resolveUrl('page', 'not a url')).toBeNull();
  });

  it('should only accept http and https schemes', () => {
    expect(UrlUtils.isHttpUrl('http://example.com/')).toBe(true);
    expect(UrlUtils.isHttpUrl('https://example.com/')).toBe(true);
    expect(UrlUtils.isHttpUrl('ftp://example.com/')).toBe(false);
    expect(UrlUtils.isHttpUrl('example.com')).toBe(false);
  });

  it('should compare host names', () => {
    expect(UrlUtils.extractDomain('https://docs.example.com/a')).toBe('docs.example.com');
    expect(UrlUtils.isSameDomain('https://example.com/a', 'http://example.com/b')).toBe(true);
    expect(UrlUtils.isSameDomain('https://docs.example.com/a', 'https://example.com/')).toBe(false);
    expect(UrlUtils.isSameDomain('not a url', 'not a url')).toBe(false);
  });
});
