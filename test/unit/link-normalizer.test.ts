import { describe, test, expect } from '@jest/globals';
import { toDirectDownloadUrl, withCacheBuster } from '../../src/link-normalizer';

describe('toDirectDownloadUrl', () => {
  test.each([
    [
      'https://contoso.sharepoint.com/:x:/g/personal/fleet/EbcD?e=xyz',
      'https://contoso.sharepoint.com/:x:/g/personal/fleet/EbcD?e=xyz&download=1',
    ],
    [
      'https://contoso.sharepoint.com/sites/fleet/drivers.xlsx?web=1&e=1',
      'https://contoso.sharepoint.com/sites/fleet/drivers.xlsx?download=1&e=1',
    ],
    [
      'contoso-my.sharepoint.com/personal/drivers.xlsx',
      'https://contoso-my.sharepoint.com/personal/drivers.xlsx?download=1',
    ],
    [
      'https://contoso.sharepoint.com/drivers.xlsx?download=1',
      'https://contoso.sharepoint.com/drivers.xlsx?download=1',
    ],
    [
      'https://contoso.sharepoint.com/drivers.xlsx#top',
      'https://contoso.sharepoint.com/drivers.xlsx?download=1#top',
    ],
  ])('SharePoint %s', (input, expected) => {
    expect(toDirectDownloadUrl(input)).toBe(expected);
  });

  test.each([
    [
      'https://onedrive.live.com/redir?resid=ABC!123&authkey=!XYZ',
      'https://onedrive.live.com/download?resid=ABC!123&authkey=!XYZ&download=1',
    ],
    [
      'https://onedrive.live.com/view.aspx?resid=ABC!123',
      'https://onedrive.live.com/download.aspx?resid=ABC!123&download=1',
    ],
    ['https://1drv.ms/x/s!AbCdEf', 'https://1drv.ms/x/s!AbCdEf?download=1'],
  ])('OneDrive %s', (input, expected) => {
    expect(toDirectDownloadUrl(input)).toBe(expected);
  });

  test('leaves other hosts alone apart from the scheme', () => {
    expect(toDirectDownloadUrl('https://files.example.test/drivers.xlsx?x=1')).toBe(
      'https://files.example.test/drivers.xlsx?x=1'
    );
    expect(toDirectDownloadUrl('files.example.test/drivers.xlsx')).toBe(
      'https://files.example.test/drivers.xlsx'
    );
  });

  test('does not treat look-alike hosts as SharePoint', () => {
    expect(toDirectDownloadUrl('https://contoso.sharepoint.com.example.test/a')).toBe(
      'https://contoso.sharepoint.com.example.test/a'
    );
  });

  test('is idempotent', () => {
    const inputs = [
      'https://contoso.sharepoint.com/:x:/g/personal/fleet/EbcD?e=xyz',
      'https://contoso.sharepoint.com/sites/fleet/drivers.xlsx?web=1',
      'contoso.sharepoint.com/drivers.xlsx#top',
      'https://onedrive.live.com/redir?resid=ABC!123',
      'https://onedrive.live.com/view.aspx?resid=ABC!123',
      'https://1drv.ms/x/s!AbCdEf',
      'files.example.test/drivers.xlsx',
    ];
    for (const input of inputs) {
      const once = toDirectDownloadUrl(input);
      expect(toDirectDownloadUrl(once)).toBe(once);
    }
  });
});

describe('withCacheBuster', () => {
  const now = 1_700_000_000_500;

  test('appends epoch seconds with the right separator', () => {
    expect(withCacheBuster('https://a.example.test/f?x=1', now)).toBe(
      'https://a.example.test/f?x=1&_cb=1700000000'
    );
    expect(withCacheBuster('https://a.example.test/f', now)).toBe(
      'https://a.example.test/f?_cb=1700000000'
    );
  });

  test('keeps the fragment last', () => {
    expect(withCacheBuster('https://a.example.test/f?download=1#top', now)).toBe(
      'https://a.example.test/f?download=1&_cb=1700000000#top'
    );
  });
});
