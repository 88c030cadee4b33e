import { Injectable } from '../../shared/decorators';
import type { HttpRequest, HttpResponse, IHttpTransport } from '../../domain/interfaces/http.interface';

@Injectable()
export class FetchTransport implements IHttpTransport {
  async send(request: HttpRequest): Promise<HttpResponse> {
    const response = await fetch(request.url, {
      method: 'GET',
      headers: request.headers,
      redirect: 'manual',
      signal: AbortSignal.timeout(request.timeoutMs),
    });

    // Drain the body under the same timeout so the pooled connection is released.
    const text = await response.text();

    return {
      status: response.status,
      ok: response.ok,
      setCookies: response.headers.getSetCookie(),
      location: response.headers.get('location'),
      json: async () => JSON.parse(text),
    };
  }
}
