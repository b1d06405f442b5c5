import { ConfigurationError } from "./errors";

type Env = Record<string, string | undefined>;

export interface AppConfig {
  server: { host: string; port: number };
  instantly: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    serverErrorRetries: number;
  };
  openai: {
    apiKey: string | null;
    baseUrl: string;
    model: string;
  };
  brand: {
    companyName: string;
    whatsappNumber: string | null;
  };
  rateLimit: { maxRequests: number; windowSeconds: number };
  retry: { maxAttempts: number; initialDelaySeconds: number; backoffFactor: number };
  dedup: { ttlHours: number };
  batch: {
    concurrency: { campaign: number; all: number };
    fetchLimit: { campaign: number; all: number };
  };
}

export function getEnvNumber(env: Env, name: string, fallback: number): number {
  const v = env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

// Keys pasted into .env often keep their quotes.
export function cleanSecret(value: string | undefined): string | null {
  if (!value) return null;
  const cleaned = value.trim().replace(/^["']+|["']+$/g, "").trim();
  return cleaned.length > 0 ? cleaned : null;
}

export function normalizeInstantlyBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, "").replace(/\/api\/v2$/, "");
}

export function loadConfig(env: Env = process.env): AppConfig {
  const instantlyKey = cleanSecret(env.INSTANTLY_API_KEY);
  if (!instantlyKey) {
    throw new ConfigurationError("Missing INSTANTLY_API_KEY env var");
  }

  return {
    server: {
      host: env.HOST || "0.0.0.0",
      port: getEnvNumber(env, "PORT", 8000),
    },
    instantly: {
      apiKey: instantlyKey,
      baseUrl: normalizeInstantlyBaseUrl(env.INSTANTLY_API_URL || "https://api.instantly.ai"),
      timeoutMs: getEnvNumber(env, "INSTANTLY_TIMEOUT_MS", 30_000),
      serverErrorRetries: getEnvNumber(env, "INSTANTLY_SERVER_ERROR_RETRIES", 3),
    },
    openai: {
      apiKey: cleanSecret(env.OPENAI_API_KEY),
      baseUrl: (env.OPENAI_API_URL || "https://api.openai.com/v1").replace(/\/+$/, ""),
      model: env.OPENAI_MODEL || "gpt-4o",
    },
    brand: {
      companyName: env.COMPANY_NAME || "Riverline",
      whatsappNumber: cleanSecret(env.SUPPORT_WHATSAPP),
    },
    rateLimit: {
      maxRequests: getEnvNumber(env, "RATE_LIMIT_MAX_REQUESTS", 100),
      windowSeconds: getEnvNumber(env, "RATE_LIMIT_WINDOW_SECONDS", 10),
    },
    retry: {
      maxAttempts: getEnvNumber(env, "RETRY_MAX_ATTEMPTS", 5),
      initialDelaySeconds: getEnvNumber(env, "RETRY_INITIAL_DELAY_SECONDS", 20),
      backoffFactor: getEnvNumber(env, "RETRY_BACKOFF_FACTOR", 2),
    },
    dedup: {
      ttlHours: getEnvNumber(env, "DEDUP_TTL_HOURS", 7 * 24),
    },
    batch: {
      // The all-pending fetch is the heavier path, so it fans out less.
      concurrency: {
        campaign: getEnvNumber(env, "BATCH_CONCURRENCY_CAMPAIGN", 8),
        all: getEnvNumber(env, "BATCH_CONCURRENCY_ALL", 5),
      },
      fetchLimit: {
        campaign: getEnvNumber(env, "BATCH_FETCH_LIMIT_CAMPAIGN", 50),
        all: getEnvNumber(env, "BATCH_FETCH_LIMIT_ALL", 100),
      },
    },
  };
}
