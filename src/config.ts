export interface SecurityHeadersConfig {
  isProduction: boolean;
  cspFrameAncestors: string[];
  cspConnectSrc: string[];
}

export interface RateLimitConfig {
  enabled: boolean;
  readPerMinute: number;
  writePerMinute: number;
}

export interface AppConfig {
  port: number;
  passwordHashRounds: number;
  rateLimit?: Partial<RateLimitConfig>;
  securityHeaders?: Partial<SecurityHeadersConfig>;
}

export const DEFAULT_PASSWORD_HASH_ROUNDS = 12;
const MIN_PASSWORD_HASH_ROUNDS = 4;
const MAX_PASSWORD_HASH_ROUNDS = 15;

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.toLowerCase();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }
  return defaultValue;
}

function parseCsvList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parsePositiveInteger(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return defaultValue;
  }

  return parsed;
}

function parsePasswordHashRounds(value: string | undefined): number {
  if (!value) {
    return DEFAULT_PASSWORD_HASH_ROUNDS;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < MIN_PASSWORD_HASH_ROUNDS || parsed > MAX_PASSWORD_HASH_ROUNDS) {
    throw new Error(
      `PASSWORD_HASH_ROUNDS must be an integer between ${MIN_PASSWORD_HASH_ROUNDS} and ${MAX_PASSWORD_HASH_ROUNDS}`
    );
  }

  return parsed;
}

function normalizeCspSource(source: string): string {
  const trimmed = source.trim();
  const withoutQuotes = trimmed.replace(/^'(.*)'$/, "$1").toLowerCase();

  if (withoutQuotes === "none") {
    return "'none'";
  }
  if (withoutQuotes === "self") {
    return "'self'";
  }

  return trimmed;
}

export function parseCspSourceList(value: string | undefined, fallback: string[]): string[] {
  const parsed = parseCsvList(value).map(normalizeCspSource);
  return parsed.length > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const isProduction = (env.NODE_ENV ?? "").toLowerCase() === "production";

  return {
    port: parsePositiveInteger(env.PORT, 3000),
    passwordHashRounds: parsePasswordHashRounds(env.PASSWORD_HASH_ROUNDS),
    rateLimit: {
      enabled: parseBoolean(env.RATE_LIMIT_ENABLED, true),
      readPerMinute: parsePositiveInteger(env.RATE_LIMIT_READ_PER_MIN, 120),
      writePerMinute: parsePositiveInteger(env.RATE_LIMIT_WRITE_PER_MIN, 30)
    },
    securityHeaders: {
      isProduction,
      cspFrameAncestors: parseCspSourceList(env.CSP_FRAME_ANCESTORS, ["'none'"]),
      cspConnectSrc: parseCspSourceList(env.CSP_CONNECT_SRC, ["'self'"])
    }
  };
}
