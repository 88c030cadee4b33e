// The origin filters on these; they mimic a desktop Chrome session.
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/116.0.0.0 Safari/537.36';

export const PAGE_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'User-Agent': BROWSER_USER_AGENT,
  'Accept-Language': 'en-US,en;q=0.9',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  Connection: 'keep-alive',
});

export function apiHeaders(referer: string): Record<string, string> {
  return {
    ...PAGE_HEADERS,
    Accept: 'application/json, text/plain, */*',
    Referer: referer,
  };
}
