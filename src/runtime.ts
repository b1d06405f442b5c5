import { AppConfig } from "./config";
import { DedupCache } from "./batch/dedupCache";
import { JobTracker } from "./batch/jobTracker";
import { BatchOrchestrator } from "./batch/orchestrator";
import { SlidingWindowRateLimiter } from "./batch/rateLimiter";
import { ReplyDispatcher } from "./batch/replyDispatcher";
import { RetryPolicy } from "./batch/retry";
import { errorMessage, ConfigurationError } from "./errors";
import { InstantlyClient } from "./instantly/instantlyClient";
import { createReplyGenerator } from "./replies/openaiReplyGenerator";
import { ReplyGenerator } from "./types";

export interface Runtime {
  provider: InstantlyClient;
  generator: ReplyGenerator | null;
  tracker: JobTracker;
  dedup: DedupCache;
  limiter: SlidingWindowRateLimiter;
  dispatcher: ReplyDispatcher;
  orchestrator: BatchOrchestrator | null;
}

function optionalGenerator(config: AppConfig): ReplyGenerator | null {
  try {
    return createReplyGenerator(config);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    console.warn(`[config] ${errorMessage(err)}; reply generation is disabled`);
    return null;
  }
}

/** Wires one process-wide set of shared components from config. */
export function buildRuntime(config: AppConfig): Runtime {
  const retry: RetryPolicy = {
    maxAttempts: config.retry.maxAttempts,
    initialDelayMs: config.retry.initialDelaySeconds * 1000,
    backoffFactor: config.retry.backoffFactor,
  };

  const provider = new InstantlyClient(config.instantly);
  const tracker = new JobTracker();
  const dedup = new DedupCache({ ttlMs: config.dedup.ttlHours * 60 * 60 * 1000 });
  const limiter = new SlidingWindowRateLimiter({
    maxRequests: config.rateLimit.maxRequests,
    windowMs: config.rateLimit.windowSeconds * 1000,
  });
  const dispatcher = new ReplyDispatcher({ provider, limiter, dedup, retry });
  const generator = optionalGenerator(config);

  const orchestrator = generator
    ? new BatchOrchestrator({
        provider,
        generator,
        tracker,
        dedup,
        dispatcher,
        retry,
        concurrency: config.batch.concurrency,
        fetchLimit: config.batch.fetchLimit,
      })
    : null;

  return { provider, generator, tracker, dedup, limiter, dispatcher, orchestrator };
}
