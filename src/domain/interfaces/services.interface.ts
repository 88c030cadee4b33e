import type { CookieMap } from '../entities/session-state.entity';
import type { OITotals, RawMarketPayload, Snapshot } from '../entities/snapshot.entity';
import type { AcquisitionError } from '../errors/scrape.errors';

export interface CookieSnapshot {
  readonly cookies: CookieMap;
  /** Milliseconds since acquisition; Infinity when never acquired. */
  readonly age: number;
}

export interface ISessionStore {
  getCookies(): CookieSnapshot;
  setCookies(cookies: Record<string, string>): void;
  hasCookies(): boolean;
}

export type AcquisitionResult = { ok: true } | { ok: false; error: AcquisitionError };

export interface ICookieAcquirer {
  refresh(): Promise<AcquisitionResult>;
}

export interface IOptionChainFetcher {
  fetch(): Promise<RawMarketPayload | null>;
}

export interface ISnapshotCache {
  get(): Snapshot;
  set(totals: OITotals): Snapshot;
  hasData(): boolean;
}

export type PollLoopState = 'stopped' | 'idle' | 'fetching';

export interface PollLoopStats {
  readonly state: PollLoopState;
  readonly cycles: number;
  readonly successes: number;
  readonly failures: number;
  readonly consecutiveFailures: number;
  readonly lastSuccessAt: number | null;
  readonly lastFailureAt: number | null;
}

export interface IPollLoop {
  start(): void;
  stop(): Promise<void>;
  runCycle(): Promise<boolean>;
  getStats(): PollLoopStats;
}
