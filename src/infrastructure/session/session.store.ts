import { Injectable } from '../../shared/decorators';
import { EMPTY_SESSION, type SessionState } from '../../domain/entities/session-state.entity';
import type { CookieSnapshot, ISessionStore } from '../../domain/interfaces/services.interface';

/**
 * Holds the origin cookies and when they were obtained.
 * The state is a single frozen object swapped on write, so cookies and
 * acquiredAt can never be observed out of step with each other.
 */
@Injectable()
export class SessionStore implements ISessionStore {
  private state: SessionState = EMPTY_SESSION;

  getCookies(): CookieSnapshot {
    const { cookies, acquiredAt } = this.state;
    return {
      cookies,
      age: acquiredAt === 0 ? Infinity : Date.now() - acquiredAt,
    };
  }

  setCookies(cookies: Record<string, string>): void {
    this.state = Object.freeze({
      cookies: Object.freeze({ ...cookies }),
      acquiredAt: Date.now(),
    });
  }

  hasCookies(): boolean {
    return Object.keys(this.state.cookies).length > 0;
  }
}
