export interface HttpRequest {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly timeoutMs: number;
}

/** The parts of an HTTP response the scraper needs; body is read at most once. */
export interface HttpResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly setCookies: readonly string[];
  /** `Location` header of a redirect response, null otherwise. */
  readonly location: string | null;
  json(): Promise<unknown>;
}

/** Wire-level sender. Production uses fetch; tests plug in a fake origin. */
export interface IHttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export interface HttpGetOptions {
  headers?: Readonly<Record<string, string>>;
  /** Sent on top of the jar; wins on name clashes. */
  cookies?: Readonly<Record<string, string>>;
  timeoutMs?: number;
}

export interface IHttpSession {
  get(url: string, options?: HttpGetOptions): Promise<HttpResponse>;
  /** Everything the origin has set so far. */
  getCookies(): Record<string, string>;
}
