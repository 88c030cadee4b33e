import type { HttpRequest, HttpResponse, IHttpTransport } from '../../domain/interfaces/http.interface';
import { AppConfig } from '../../shared/config';

export const ORIGIN = 'https://origin.test';
export const API_PATH = '/api/option-chain-indices';

export interface FakeReply {
  status: number;
  body?: unknown;
  /** Sent as-is instead of `body`, to simulate broken JSON. */
  rawBody?: string;
  setCookies?: string[];
  location?: string;
}

type Handler = (request: HttpRequest) => FakeReply;

/**
 * In-process stand-in for the origin: routes by pathname, records every request,
 * and can be switched to behave like an unreachable host.
 */
export class FakeOrigin implements IHttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly routes = new Map<string, Handler>();
  private unreachable = false;

  on(path: string, reply: FakeReply | Handler): this {
    this.routes.set(path, typeof reply === 'function' ? reply : () => reply);
    return this;
  }

  /** Replies from `replies` in order, repeating the last one once exhausted. */
  sequence(path: string, replies: FakeReply[]): this {
    let index = 0;
    return this.on(path, () => replies[Math.min(index++, replies.length - 1)]);
  }

  setUnreachable(unreachable: boolean): void {
    this.unreachable = unreachable;
  }

  paths(): string[] {
    return this.requests.map((request) => new URL(request.url).pathname);
  }

  count(path: string): number {
    return this.paths().filter((requested) => requested === path).length;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    if (this.unreachable) {
      throw new TypeError('fetch failed');
    }

    const handler = this.routes.get(new URL(request.url).pathname);
    const reply: FakeReply = handler ? handler(request) : { status: 404, body: { error: 'not found' } };
    const text = reply.rawBody ?? JSON.stringify(reply.body ?? {});

    return {
      status: reply.status,
      ok: reply.status >= 200 && reply.status < 300,
      setCookies: reply.setCookies ?? [],
      location: reply.location ?? null,
      json: async () => JSON.parse(text),
    };
  }
}

/** Origin that hands out cookies on both landing pages and serves `payload` from the API. */
export function createHealthyOrigin(payload: unknown): FakeOrigin {
  return new FakeOrigin()
    .on('/', { status: 200, body: {}, setCookies: ['nsit=fresh-nsit; Path=/; HttpOnly'] })
    .on('/option-chain', { status: 200, body: {}, setCookies: ['nseappid=fresh-app; Path=/; Secure'] })
    .on(API_PATH, { status: 200, body: payload });
}

export const SAMPLE_PAYLOAD = { filtered: { CE: { totOI: 120 }, PE: { totOI: 95 } } };

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return Object.assign(new AppConfig(), { originBaseUrl: ORIGIN }, overrides);
}
