const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
const SHAREPOINT_HOSTS = ['sharepoint.com'];
const ONEDRIVE_HOSTS = ['onedrive.live.com', '1drv.ms'];

function hasQueryParam(search: string, param: string): boolean {
  return new RegExp(`[?&]${param}(?=&|$)`).test(search);
}

function appendQueryParam(search: string, param: string): string {
  if (!search || search === '?') {
    return `?${param}`;
  }
  return `${search}&${param}`;
}

function hostMatches(host: string, domains: string[]): boolean {
  return domains.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

/**
 * Turns a OneDrive / SharePoint "share" link into one that serves the file
 * bytes. Other hosts pass through untouched apart from a missing scheme.
 * Applying it to its own output is a no-op.
 */
export function toDirectDownloadUrl(rawUrl: string): string {
  const trimmed = rawUrl.trim();
  const withScheme = SCHEME_PATTERN.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    return withScheme;
  }

  const host = url.hostname.toLowerCase();
  let pathname = url.pathname;
  let search = url.search;

  if (hostMatches(host, SHAREPOINT_HOSTS)) {
    if (!hasQueryParam(search, 'download=1')) {
      search = hasQueryParam(search, 'web=1')
        ? search.replace(/([?&])web=1(?=&|$)/, '$1download=1')
        : appendQueryParam(search, 'download=1');
    }
  } else if (hostMatches(host, ONEDRIVE_HOSTS)) {
    pathname = pathname
      .split('/')
      .map((segment) => {
        if (segment === 'redir') return 'download';
        if (segment === 'view.aspx') return 'download.aspx';
        return segment;
      })
      .join('/');
    if (!hasQueryParam(search, 'download=1')) {
      search = appendQueryParam(search, 'download=1');
    }
  } else {
    return withScheme;
  }

  return `${url.protocol}//${url.host}${pathname}${search}${url.hash}`;
}

export function withCacheBuster(url: string, now: number = Date.now()): string {
  const hashIndex = url.indexOf('#');
  const base = hashIndex === -1 ? url : url.slice(0, hashIndex);
  const hash = hashIndex === -1 ? '' : url.slice(hashIndex);

  return `${base}${base.includes('?') ? '&' : '?'}_cb=${Math.floor(now / 1000)}${hash}`;
}
