import { randomUUID } from "node:crypto";
import { NotFoundError } from "../errors";
import { ItemOutcome, Job, JobScope, SkippedItem, TerminalJobStatus } from "../types";
import { Clock, systemClock } from "./time";

/**
 * In-memory job store. The orchestrator and its item workers are the only
 * writers; pollers only ever get copies.
 *
 * Mutators are synchronous, so each append/increment runs to completion
 * before another task on the event loop can touch the same record.
 */
export class JobTracker {
  private readonly jobs = new Map<string, Job>();
  private readonly now: Clock;
  private readonly newId: () => string;

  constructor(opts: { now?: Clock; newId?: () => string } = {}) {
    this.now = opts.now ?? systemClock;
    this.newId = opts.newId ?? randomUUID;
  }

  create(opts: { scope: JobScope; campaignName?: string | null }): Job {
    const nowISO = this.nowISO();
    const job: Job = {
      id: this.newId(),
      status: "processing",
      scope: opts.scope,
      campaignName: opts.campaignName ?? null,
      total: 0,
      current: 0,
      currentItem: null,
      logs: [],
      results: [],
      skippedItems: [],
      createdAt: nowISO,
      updatedAt: nowISO,
    };
    this.jobs.set(job.id, job);
    return structuredClone(job);
  }

  get(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) throw new NotFoundError(`Job ${jobId} not found`);
    return structuredClone(job);
  }

  find(jobId: string): Job | null {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  list(): Job[] {
    return Array.from(this.jobs.values())
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map((job) => structuredClone(job));
  }

  log(jobId: string, message: string): void {
    const job = this.mutable(jobId);
    job.logs.push(`${new Date(this.now()).toISOString()} ${message}`);
  }

  setTotal(jobId: string, total: number): void {
    this.mutable(jobId).total = total;
  }

  setCurrentItem(jobId: string, itemId: string | null): void {
    this.mutable(jobId).currentItem = itemId;
  }

  recordSkipped(jobId: string, skipped: SkippedItem): void {
    this.mutable(jobId).skippedItems.push({ ...skipped });
  }

  recordOutcome(jobId: string, outcome: ItemOutcome): void {
    const job = this.mutable(jobId);
    job.results.push({ ...outcome });
    job.current += 1;
  }

  /** Moves a processing job to a terminal status. Returns false if it was already terminal. */
  finalize(jobId: string, status: TerminalJobStatus, error?: string): boolean {
    const job = this.mutable(jobId);
    if (job.status !== "processing") return false;
    job.status = status;
    job.currentItem = null;
    job.finishedAt = job.updatedAt;
    if (status === "error") job.error = error ?? "Unknown error";
    return true;
  }

  private mutable(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) throw new NotFoundError(`Job ${jobId} not found`);
    job.updatedAt = this.nowISO();
    return job;
  }

  private nowISO(): string {
    return new Date(this.now()).toISOString();
  }
}
