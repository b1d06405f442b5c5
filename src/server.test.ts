import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DedupCache } from "./batch/dedupCache";
import { JobTracker } from "./batch/jobTracker";
import { BatchOrchestrator } from "./batch/orchestrator";
import { SlidingWindowRateLimiter } from "./batch/rateLimiter";
import { ReplyDispatcher } from "./batch/replyDispatcher";
import { buildServer } from "./server";
import { FakeMailProvider, FakeReplyGenerator, fakeTime, mail } from "./testing/fakes";

function setup(opts: { withGenerator?: boolean } = {}) {
  const time = fakeTime();
  const provider = new FakeMailProvider();
  const generator = opts.withGenerator === false ? null : new FakeReplyGenerator();
  let n = 0;
  const tracker = new JobTracker({ now: time.now, newId: () => `job-${++n}` });
  const dedup = new DedupCache({ now: time.now });
  const retry = { maxAttempts: 3, initialDelayMs: 1000, backoffFactor: 2 };
  const limiter = new SlidingWindowRateLimiter({ maxRequests: 100, windowMs: 10_000, now: time.now, sleep: time.sleep });
  const dispatcher = new ReplyDispatcher({ provider, limiter, dedup, retry, sleep: time.sleep });
  const orchestrator = generator
    ? new BatchOrchestrator({
        provider,
        generator,
        tracker,
        dedup,
        dispatcher,
        retry,
        concurrency: { campaign: 8, all: 5 },
        fetchLimit: { campaign: 50, all: 100 },
        sleep: time.sleep,
      })
    : null;

  const app = buildServer({ orchestrator, dispatcher, provider, generator, tracker });
  return { app, provider, dedup, limiter, orchestrator };
}

describe("server", () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await ctx.app.close();
    vi.restoreAllMocks();
  });

  it("answers health checks", async () => {
    ctx = setup();
    const res = await ctx.app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "healthy", service: "borrower-reply-agent" });
  });

  it("accepts a campaign job and serves its progress", async () => {
    ctx = setup();
    ctx.provider.items = [mail("a")];

    const res = await ctx.app.inject({
      method: "POST",
      url: "/campaign/process",
      payload: { campaign_name: "Spring Settlements", auto_reply: true, borrower_name: "Asha" },
    });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ success: true, job_id: "job-1", status_url: "/jobs/job-1" });

    await ctx.orchestrator?.settled("job-1");
    const status = await ctx.app.inject({ method: "GET", url: "/jobs/job-1" });
    const job = status.json();
    expect(job.status).toBe("completed");
    expect(job.results[0]).toMatchObject({ itemId: "a", status: "approved", generatedReply: "Hello Asha" });

    const list = await ctx.app.inject({ method: "GET", url: "/jobs" });
    expect(list.json().jobs.map((j: { id: string }) => j.id)).toEqual(["job-1"]);
  });

  it("requires a campaign name", async () => {
    ctx = setup();
    const res = await ctx.app.inject({ method: "POST", url: "/campaign/process", payload: { auto_reply: true } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "campaign_name is required" });
  });

  it("starts an all-pending job", async () => {
    ctx = setup();
    const res = await ctx.app.inject({ method: "POST", url: "/emails/process", payload: {} });

    expect(res.statusCode).toBe(202);
    await ctx.orchestrator?.settled("job-1");
    const job = (await ctx.app.inject({ method: "GET", url: "/jobs/job-1" })).json();
    expect(job.scope).toBe("all");
    expect(job.status).toBe("completed");
  });

  it("404s unknown jobs", async () => {
    ctx = setup();
    const res = await ctx.app.inject({ method: "GET", url: "/jobs/nope" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "Job nope not found" });
  });

  it("generates a reply on demand", async () => {
    ctx = setup();
    const res = await ctx.app.inject({
      method: "POST",
      url: "/auto-reply/generate",
      payload: { email_body: "Send link", borrower_name: "Asha" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ success: true, reply: "Hello Asha", model: "test-model" });
  });

  it("generates and sends a reply to one borrower", async () => {
    ctx = setup();
    ctx.provider.items = [mail("e1")];

    const res = await ctx.app.inject({
      method: "POST",
      url: "/auto-reply/to-borrower",
      payload: { email_id: "e1", borrower_name: "Asha" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ success: true, email_id: "sent-e1", reply: "Hello Asha" });
    expect(ctx.provider.sent).toEqual([
      {
        itemId: "e1",
        subject: "Loan settlement",
        body: "Hello Asha",
        htmlBody: "<p>Hello Asha</p>",
        senderAccount: "support@lender.test",
      },
    ]);
    expect(ctx.dedup.isProcessed("e1")).toBe(true);
  });

  it("sends a manual reply without looking the email up when everything is given", async () => {
    ctx = setup();

    const res = await ctx.app.inject({
      method: "POST",
      url: "/reply-email",
      payload: { email_id: "e9", body: "Noted", subject: "Loan", eaccount: "support@lender.test" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ success: true, message: "Reply sent successfully", email_id: "sent-e9" });
    expect(ctx.provider.emailLookups).toEqual([]);
    expect(ctx.provider.sent[0]).toEqual({
      itemId: "e9",
      subject: "Loan",
      body: "Noted",
      htmlBody: null,
      senderAccount: "support@lender.test",
    });
  });

  it("fills in a manual reply's subject and account from the email", async () => {
    ctx = setup();
    ctx.provider.items = [mail("e1")];

    const res = await ctx.app.inject({ method: "POST", url: "/reply-email", payload: { email_id: "e1", body: "Noted" } });

    expect(res.statusCode).toBe(200);
    expect(ctx.provider.emailLookups).toEqual(["e1"]);
    expect(ctx.provider.sent[0]).toMatchObject({ subject: "Loan settlement", senderAccount: "support@lender.test" });
  });

  it("validates manual replies", async () => {
    ctx = setup();
    const res = await ctx.app.inject({ method: "POST", url: "/reply-email", payload: { email_id: "e1" } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "body is required" });
  });

  it("sends a new email as an activated quick-send campaign", async () => {
    ctx = setup({ withGenerator: false });

    const res = await ctx.app.inject({
      method: "POST",
      url: "/send-email",
      payload: { to: "asha@borrower.test", subject: "Settlement letter", body: "Attached", eaccount: "support@lender.test" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ success: true, message: "Email sent successfully", email_id: "quick-1" });
    expect(ctx.provider.quickSends).toEqual([
      {
        to: "asha@borrower.test",
        subject: "Settlement letter",
        body: "Attached",
        htmlBody: null,
        senderAccount: "support@lender.test",
      },
    ]);
    expect(ctx.provider.activations).toEqual(["quick-1"]);
    expect(ctx.limiter.inFlightWindow()).toBe(2);
  });

  it("retries a throttled activation without creating a second campaign", async () => {
    ctx = setup();
    ctx.provider.rateLimitActivationOnce = true;
    vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const res = await ctx.app.inject({
      method: "POST",
      url: "/send-email",
      payload: { to: "asha@borrower.test", subject: "Settlement letter", body: "Attached" },
    });

    expect(res.statusCode).toBe(200);
    expect(ctx.provider.quickSends).toHaveLength(1);
    expect(ctx.provider.activations).toEqual(["quick-1", "quick-1"]);
    expect(ctx.limiter.inFlightWindow()).toBe(3);
  });

  it("rejects a send to something that is not an email address", async () => {
    ctx = setup();

    const res = await ctx.app.inject({
      method: "POST",
      url: "/send-email",
      payload: { to: "not-an-address", subject: "Settlement letter", body: "Attached" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "to must be an email address (got 'not-an-address')" });
    expect(ctx.provider.quickSends).toEqual([]);
  });

  it("answers 503 on generator routes when generation is not configured", async () => {
    ctx = setup({ withGenerator: false });
    const expected = { error: "Reply generator is not configured; set OPENAI_API_KEY and SUPPORT_WHATSAPP" };

    const generate = await ctx.app.inject({ method: "POST", url: "/auto-reply/generate", payload: { email_body: "x" } });
    const batch = await ctx.app.inject({ method: "POST", url: "/emails/process", payload: {} });

    expect(generate.statusCode).toBe(503);
    expect(generate.json()).toEqual(expected);
    expect(batch.statusCode).toBe(503);
    expect(batch.json()).toEqual(expected);
  });
});
