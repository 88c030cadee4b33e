import { IsBoolean, IsIn, IsInt, IsNotEmpty, IsString, IsUrl, Max, Min, validateSync } from 'class-validator';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export class ConfigError extends Error {
  constructor(readonly violations: string[]) {
    super(`Invalid configuration: ${violations.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export class AppConfig {
  @IsInt({ message: 'PORT must be an integer' })
  @Min(1)
  @Max(65535)
  port: number = 8000;

  @IsString()
  @IsNotEmpty({ message: 'HOST must not be empty' })
  host: string = '0.0.0.0';

  @IsUrl({ require_tld: false, require_protocol: true }, { message: 'ORIGIN_BASE_URL must be an absolute URL' })
  originBaseUrl: string = 'https://www.nseindia.com';

  @IsString()
  @IsNotEmpty({ message: 'OPTION_CHAIN_SYMBOL must not be empty' })
  symbol: string = 'NIFTY';

  @IsInt({ message: 'POLL_INTERVAL_MS must be an integer' })
  @Min(1000)
  pollIntervalMs: number = 60_000;

  @IsInt({ message: 'COOKIE_TTL_MS must be an integer' })
  @Min(1000)
  cookieTtlMs: number = 600_000;

  @IsInt({ message: 'REQUEST_TIMEOUT_MS must be an integer' })
  @Min(100)
  @Max(120_000)
  requestTimeoutMs: number = 10_000;

  @IsIn(LOG_LEVELS)
  logLevel: string = 'info';

  @IsBoolean()
  logToFile: boolean = false;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  // NaN fails the @IsInt check with the variable's own message
  return raw ? Number(raw) : fallback;
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined ? fallback : raw.trim();
}

/** Only `true`/`false` (any case); anything else is reported, never read as false. */
function readBoolean(env: Env, key: string, fallback: boolean, violations: string[]): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === 'true' || raw === 'false') return raw === 'true';

  violations.push(`${key} must be "true" or "false"`);
  return fallback;
}

/**
 * Builds the application config from environment variables, falling back to defaults.
 * Throws ConfigError listing every violated constraint.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const config = new AppConfig();
  const violations: string[] = [];

  config.port = readNumber(env, 'PORT', config.port);
  config.host = readString(env, 'HOST', config.host);
  config.originBaseUrl = readString(env, 'ORIGIN_BASE_URL', config.originBaseUrl).replace(/\/+$/, '');
  config.symbol = readString(env, 'OPTION_CHAIN_SYMBOL', config.symbol).toUpperCase();
  config.pollIntervalMs = readNumber(env, 'POLL_INTERVAL_MS', config.pollIntervalMs);
  config.cookieTtlMs = readNumber(env, 'COOKIE_TTL_MS', config.cookieTtlMs);
  config.requestTimeoutMs = readNumber(env, 'REQUEST_TIMEOUT_MS', config.requestTimeoutMs);
  config.logLevel = readString(env, 'LOG_LEVEL', config.logLevel).toLowerCase();
  config.logToFile = readBoolean(env, 'LOG_TO_FILE', config.logToFile, violations);

  for (const error of validateSync(config)) {
    violations.push(...Object.values(error.constraints ?? {}));
  }
  if (violations.length > 0) {
    throw new ConfigError(violations);
  }

  return config;
}
