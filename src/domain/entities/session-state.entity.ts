export type CookieMap = Readonly<Record<string, string>>;

export interface SessionState {
  readonly cookies: CookieMap;
  /** Epoch ms of the last successful acquisition; 0 means never acquired. */
  readonly acquiredAt: number;
}

export const EMPTY_SESSION: SessionState = Object.freeze({
  cookies: Object.freeze({}),
  acquiredAt: 0,
});
