import { Inject, Injectable } from '../../shared/decorators';
import { TOKENS } from '../../shared/tokens';
import type { AppConfig } from '../../shared/config';
import type {
  HttpGetOptions,
  HttpResponse,
  IHttpSession,
  IHttpTransport,
} from '../../domain/interfaces/http.interface';

interface ParsedCookie {
  name: string;
  value: string;
  expired: boolean;
}

export function parseSetCookie(header: string, now: number = Date.now()): ParsedCookie | null {
  const [pair, ...attributes] = header.split(';');
  const separator = pair.indexOf('=');
  if (separator <= 0) return null;

  const name = pair.slice(0, separator).trim();
  const value = pair.slice(separator + 1).trim();
  if (!name) return null;

  let expired = value === '';
  for (const attribute of attributes) {
    const [rawKey, ...rest] = attribute.split('=');
    const key = rawKey.trim().toLowerCase();
    const attrValue = rest.join('=').trim();

    if (key === 'max-age' && Number(attrValue) <= 0) {
      expired = true;
    } else if (key === 'expires') {
      const expiresAt = Date.parse(attrValue);
      if (!Number.isNaN(expiresAt) && expiresAt <= now) expired = true;
    }
  }

  return { name, value, expired };
}

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);
export const MAX_REDIRECTS = 5;

export function serializeCookies(cookies: Readonly<Record<string, string>>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

/**
 * Browser-like session against a single origin: a cookie jar fed by the Set-Cookie
 * headers of every response, redirect hops included. Redirects are followed here
 * so each hop's cookies land in the jar and go out with the next hop.
 */
@Injectable()
export class HttpSession implements IHttpSession {
  private readonly jar = new Map<string, string>();

  constructor(
    @Inject(TOKENS.HttpTransport) private readonly transport: IHttpTransport,
    @Inject(TOKENS.AppConfig) private readonly config: AppConfig,
  ) {}

  async get(url: string, options: HttpGetOptions = {}): Promise<HttpResponse> {
    let target = url;

    for (let hop = 0; ; hop++) {
      const response = await this.transport.send({
        url: target,
        headers: this.buildHeaders(options),
        timeoutMs: options.timeoutMs ?? this.config.requestTimeoutMs,
      });
      this.absorb(response.setCookies);

      if (!REDIRECT_STATUSES.has(response.status) || !response.location) {
        return response;
      }
      if (hop >= MAX_REDIRECTS) {
        throw new Error(`Too many redirects starting from ${url}`);
      }
      target = new URL(response.location, target).toString();
    }
  }

  getCookies(): Record<string, string> {
    return Object.fromEntries(this.jar);
  }

  private buildHeaders(options: HttpGetOptions): Record<string, string> {
    const headers: Record<string, string> = { ...options.headers };
    const cookieHeader = serializeCookies({ ...this.getCookies(), ...options.cookies });
    if (cookieHeader) {
      headers.Cookie = cookieHeader;
    }
    return headers;
  }

  private absorb(setCookies: readonly string[]): void {
    const now = Date.now();
    for (const header of setCookies) {
      const cookie = parseSetCookie(header, now);
      if (!cookie) continue;

      if (cookie.expired) {
        this.jar.delete(cookie.name);
      } else {
        this.jar.set(cookie.name, cookie.value);
      }
    }
  }
}
