import { errorMessage, ProviderError } from "../errors";
import { ItemOutcome, JobScope, MailItem, MailProvider, ReplyGenerator } from "../types";
import { runBounded } from "./concurrency";
import { DedupCache } from "./dedupCache";
import { JobTracker } from "./jobTracker";
import { describeRetry, ReplyDispatcher, textToHtml } from "./replyDispatcher";
import { RetryPolicy, runWithRetry } from "./retry";
import { Sleep } from "./time";

export interface BatchRequest {
  campaignName?: string | null;
  autoReply: boolean;
  borrowerName?: string | null;
  context?: Record<string, unknown>;
}

export interface BatchOrchestratorDeps {
  provider: MailProvider;
  generator: ReplyGenerator;
  tracker: JobTracker;
  dedup: DedupCache;
  dispatcher: ReplyDispatcher;
  retry: RetryPolicy;
  concurrency: Record<JobScope, number>;
  fetchLimit: Record<JobScope, number>;
  sleep?: Sleep;
}

/**
 * Drives one batch job per submission:
 * fetch candidates, filter against the dedup cache, then generate (and
 * optionally send) a reply per item with bounded concurrency.
 */
export class BatchOrchestrator {
  private readonly running = new Map<string, Promise<void>>();

  constructor(private readonly deps: BatchOrchestratorDeps) {}

  /** Creates the job and starts it in the background. Returns the job id right away. */
  submit(request: BatchRequest): string {
    const campaignName = request.campaignName?.trim() || null;
    const scope: JobScope = campaignName ? "campaign" : "all";
    const job = this.deps.tracker.create({ scope, campaignName });
    this.deps.tracker.log(
      job.id,
      campaignName ? `Job submitted for campaign '${campaignName}'` : "Job submitted for all pending emails"
    );

    const task = this.drive(job.id, scope, { ...request, campaignName }).finally(() => this.running.delete(job.id));
    this.running.set(job.id, task);
    return job.id;
  }

  /** Resolves once the job's driver has finished (immediately for unknown or finished jobs). */
  async settled(jobId: string): Promise<void> {
    await (this.running.get(jobId) ?? Promise.resolve());
  }

  get activeJobCount(): number {
    return this.running.size;
  }

  private async drive(jobId: string, scope: JobScope, request: BatchRequest): Promise<void> {
    try {
      await this.execute(jobId, scope, request);
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[batch] job ${jobId} failed: ${message}`);
      this.deps.tracker.log(jobId, `Job failed: ${message}`);
      this.deps.tracker.finalize(jobId, "error", message);
    }
  }

  private async execute(jobId: string, scope: JobScope, request: BatchRequest): Promise<void> {
    const { tracker } = this.deps;
    const candidates = await this.fetchCandidates(jobId, scope, request.campaignName ?? null);
    const toProcess = this.filterCandidates(jobId, candidates, request.autoReply);

    if (toProcess.length === 0) {
      tracker.log(jobId, "No new emails to process");
      tracker.finalize(jobId, "completed");
      return;
    }

    // Item failures are folded into outcomes by processItem; only batch-level failures reach drive().
    const limit = this.deps.concurrency[scope];
    tracker.log(jobId, `Processing ${toProcess.length} email(s), up to ${limit} at a time`);
    await runBounded(toProcess, limit, async (item) => {
      const outcome = await this.processItem(jobId, item, request);
      tracker.recordOutcome(jobId, outcome);
      return outcome;
    });

    const job = tracker.get(jobId);
    const count = (status: ItemOutcome["status"]) => job.results.filter((r) => r.status === status).length;
    const summary = `Finished: ${count("approved")} sent, ${count("generated_only")} generated, ${count(
      "error"
    )} failed, ${job.skippedItems.length} skipped`;
    tracker.log(jobId, summary);
    tracker.finalize(jobId, "completed");
    console.log(`[batch] job ${jobId} ${summary}`);
  }

  private async fetchCandidates(jobId: string, scope: JobScope, campaignName: string | null): Promise<MailItem[]> {
    const { provider, tracker, fetchLimit } = this.deps;

    if (scope === "campaign" && campaignName) {
      tracker.log(jobId, `Looking up campaign '${campaignName}'`);
      const campaignId = await this.withRetry(jobId, "campaign lookup", () => provider.resolveCampaign(campaignName));
      tracker.log(jobId, `Fetching unread emails for campaign ${campaignId}`);
      const items = await this.withRetry(jobId, "email fetch", () =>
        provider.fetchPending({ kind: "campaign", campaignId }, fetchLimit.campaign)
      );
      tracker.log(jobId, `Fetched ${items.length} email(s)`);
      return items;
    }

    tracker.log(jobId, "Fetching all unread emails");
    const items = await this.withRetry(jobId, "email fetch", () => provider.fetchPending({ kind: "all" }, fetchLimit.all));
    tracker.log(jobId, `Fetched ${items.length} email(s)`);
    return items;
  }

  /**
   * Sending jobs claim each item they keep, so an overlapping job sees it as
   * already processed. processItem releases the claim when the item fails.
   */
  private filterCandidates(jobId: string, candidates: MailItem[], claim: boolean): MailItem[] {
    const { tracker, dedup } = this.deps;
    const seen = new Set<string>();
    const toProcess: MailItem[] = [];

    for (const item of candidates) {
      const skip = { itemId: item.id, sourceIdentity: item.senderAddress };
      if (item.isSentItem) {
        tracker.recordSkipped(jobId, { ...skip, reason: "sent_item" });
        continue;
      }
      if (seen.has(item.id)) {
        tracker.recordSkipped(jobId, { ...skip, reason: "duplicate_in_batch" });
        continue;
      }
      seen.add(item.id);
      const taken = claim ? !dedup.tryClaim(item.id) : dedup.isProcessed(item.id);
      if (taken) {
        tracker.recordSkipped(jobId, { ...skip, reason: "already_processed" });
        continue;
      }
      toProcess.push(item);
    }

    const skipped = candidates.length - toProcess.length;
    if (skipped > 0) tracker.log(jobId, `Skipped ${skipped} email(s) (sent, duplicate or already replied)`);
    tracker.setTotal(jobId, toProcess.length);
    return toProcess;
  }

  private async processItem(jobId: string, item: MailItem, request: BatchRequest): Promise<ItemOutcome> {
    const { tracker, generator, dispatcher, dedup } = this.deps;
    const base = { itemId: item.id, sourceIdentity: item.senderAddress, subject: item.subject };
    const who = item.senderAddress ?? "unknown sender";

    try {
      tracker.setCurrentItem(jobId, item.id);
      tracker.log(jobId, `Generating reply for ${who} (${item.id})`);
      const reply = await generator.generate({
        emailBody: item.bodyText,
        subject: item.subject,
        borrowerName: request.borrowerName || item.senderAddress,
        context: request.context ?? {},
      });

      if (!request.autoReply) {
        tracker.log(jobId, `Reply generated for ${who} (not sent)`);
        return { ...base, generatedReply: reply, status: "generated_only" };
      }

      const senderAccount = item.senderAccount;
      if (!senderAccount) {
        throw new ProviderError(`Sender account (eaccount) is missing on email ${item.id}; cannot reply`);
      }

      const deliveryId = await dispatcher.deliver(
        { itemId: item.id, subject: item.subject, body: reply, htmlBody: textToHtml(reply), senderAccount },
        (line) => tracker.log(jobId, line)
      );
      tracker.log(jobId, `Reply sent to ${who}`);
      return { ...base, generatedReply: reply, status: "approved", deliveryId };
    } catch (err) {
      if (request.autoReply) dedup.release(item.id);
      const message = errorMessage(err);
      tracker.log(jobId, `Error on ${who} (${item.id}): ${message}`);
      console.error(`[batch] job ${jobId} item ${item.id} failed: ${message}`);
      return { ...base, status: "error", errorDetail: message };
    }
  }

  private withRetry<T>(jobId: string, label: string, operation: () => Promise<T>): Promise<T> {
    return runWithRetry(operation, {
      ...this.deps.retry,
      sleep: this.deps.sleep,
      onRetry: (info) => this.deps.tracker.log(jobId, describeRetry(label, info)),
    });
  }
}
