import { DIContainer } from './shared/container';
import { TOKENS } from './shared/tokens';
import type { AppConfig } from './shared/config';
import type { IHttpTransport } from './domain/interfaces/http.interface';
import { FetchTransport } from './infrastructure/http/fetch.transport';
import { HttpSession } from './infrastructure/http/http-session';
import { OptionChainClient } from './infrastructure/http/option-chain.client';
import { SessionStore } from './infrastructure/session/session.store';
import { CookieAcquirerService } from './infrastructure/session/cookie-acquirer.service';
import { SnapshotCache } from './infrastructure/cache/snapshot.cache';
import { PollLoopService } from './infrastructure/services/poll-loop.service';
import { UptimeService } from './infrastructure/services/uptime.service';
import { OiSnapshotApp } from './app';

export interface RegisterOptions {
  /** Replaces the fetch-based transport, e.g. with an in-process fake origin. */
  transport?: IHttpTransport;
}

export function registerDependencies(
  config: AppConfig,
  options: RegisterOptions = {},
  container: DIContainer = DIContainer.getInstance(),
): DIContainer {
  container.bind(TOKENS.AppConfig, () => config);

  // --- Origin access (owned by the poll loop only) ---
  const { transport } = options;
  if (transport) {
    container.bind(TOKENS.HttpTransport, () => transport);
  } else {
    container.bindClass(TOKENS.HttpTransport, FetchTransport);
  }
  container.bindClass(TOKENS.HttpSession, HttpSession);
  container.bindClass(TOKENS.SessionStore, SessionStore);
  container.bindClass(TOKENS.CookieAcquirer, CookieAcquirerService);
  container.bindClass(TOKENS.OptionChainFetcher, OptionChainClient);

  // --- Shared between the loop and the read path ---
  container.bindClass(TOKENS.SnapshotCache, SnapshotCache);

  container.bindClass(TOKENS.PollLoop, PollLoopService);
  container.bindClass(TOKENS.UptimeService, UptimeService);
  container.bindClass(TOKENS.App, OiSnapshotApp);

  return container;
}
