/**
 * Container tokens. Interfaces have no runtime identity, so bindings are keyed by name.
 */
export const TOKENS = {
  AppConfig: 'AppConfig',
  HttpTransport: 'IHttpTransport',
  HttpSession: 'IHttpSession',
  SessionStore: 'ISessionStore',
  CookieAcquirer: 'ICookieAcquirer',
  OptionChainFetcher: 'IOptionChainFetcher',
  SnapshotCache: 'ISnapshotCache',
  PollLoop: 'IPollLoop',
  UptimeService: 'UptimeService',
  App: 'OiSnapshotApp',
} as const;
