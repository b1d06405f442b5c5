import Fastify, { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { BatchOrchestrator, BatchRequest } from "./batch/orchestrator";
import { JobTracker } from "./batch/jobTracker";
import { ReplyDispatcher, textToHtml } from "./batch/replyDispatcher";
import { ConfigurationError, GenerationFailedError, NotFoundError, RateLimitedError } from "./errors";
import { MailItem, ReplyGenerator } from "./types";

export const SERVICE_NAME = "borrower-reply-agent";

export interface EmailLookup {
  getEmail(emailId: string): Promise<MailItem>;
}

export interface ServerDeps {
  orchestrator: BatchOrchestrator | null;
  dispatcher: ReplyDispatcher;
  provider: EmailLookup;
  generator: ReplyGenerator | null;
  tracker: JobTracker;
}

type Body = Record<string, unknown>;

const EMAIL_ADDRESS = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

const GENERATOR_MISSING = "Reply generator is not configured; set OPENAI_API_KEY and SUPPORT_WHATSAPP";

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

function bodyOf(raw: unknown): Body {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw) ? Object.fromEntries(Object.entries(raw)) : {};
}

function optionalString(body: Body, key: string): string | null {
  const v = body[key];
  return typeof v === "string" && v.trim() ? v.trim() : null;
}

function requiredString(body: Body, key: string): string {
  const v = optionalString(body, key);
  if (!v) throw new BadRequestError(`${key} is required`);
  return v;
}

function contextOf(body: Body): Record<string, unknown> {
  const v = body.context;
  return typeof v === "object" && v !== null && !Array.isArray(v) ? Object.fromEntries(Object.entries(v)) : {};
}

function flag(body: Body, key: string): boolean {
  const v = body[key];
  return v === true || v === "true";
}

function statusFor(err: Error & { statusCode?: number }): number {
  if (err instanceof BadRequestError) return 400;
  if (err instanceof NotFoundError) return 404;
  if (err instanceof RateLimitedError) return 429;
  if (err instanceof GenerationFailedError) return 502;
  if (err instanceof ConfigurationError) return 503;
  // Fastify's own errors (malformed JSON, oversized body) carry a status.
  if (typeof err.statusCode === "number" && err.statusCode < 500) return err.statusCode;
  return 500;
}

function emailResponse(message: string, emailId: string) {
  return { success: true, message, email_id: emailId, timestamp: new Date().toISOString() };
}

export function buildServer(deps: ServerDeps, opts: { logger?: boolean } = {}): FastifyInstance {
  const app = Fastify({ logger: opts.logger ?? false });
  const { tracker, dispatcher, provider } = deps;

  app.register(cors, { origin: "*" });

  app.setErrorHandler((err, request, reply) => {
    const status = statusFor(err);
    if (status >= 500) request.log.error(err);
    return reply.code(status).send({ error: err.message });
  });

  function requireOrchestrator(): BatchOrchestrator {
    if (!deps.orchestrator) throw new ConfigurationError(GENERATOR_MISSING);
    return deps.orchestrator;
  }

  function requireGenerator(): ReplyGenerator {
    if (!deps.generator) throw new ConfigurationError(GENERATOR_MISSING);
    return deps.generator;
  }

  function submit(request: BatchRequest) {
    const jobId = requireOrchestrator().submit(request);
    return { success: true, job_id: jobId, status_url: `/jobs/${jobId}` };
  }

  app.get("/health", async () => ({
    status: "healthy",
    service: SERVICE_NAME,
    timestamp: new Date().toISOString(),
  }));

  app.post<{ Body: unknown }>("/campaign/process", async (request, reply) => {
    const body = bodyOf(request.body);
    const campaignName = requiredString(body, "campaign_name");
    const accepted = submit({
      campaignName,
      autoReply: flag(body, "auto_reply"),
      borrowerName: optionalString(body, "borrower_name"),
      context: contextOf(body),
    });
    return reply.code(202).send(accepted);
  });

  app.post<{ Body: unknown }>("/emails/process", async (request, reply) => {
    const body = bodyOf(request.body);
    const accepted = submit({
      campaignName: null,
      autoReply: flag(body, "auto_reply"),
      borrowerName: optionalString(body, "borrower_name"),
      context: contextOf(body),
    });
    return reply.code(202).send(accepted);
  });

  app.get<{ Params: { id: string } }>("/jobs/:id", async (request) => tracker.get(request.params.id));

  app.get("/jobs", async () => ({ jobs: tracker.list() }));

  app.post<{ Body: unknown }>("/auto-reply/generate", async (request) => {
    const generator = requireGenerator();
    const body = bodyOf(request.body);
    const reply = await generator.generate({
      emailBody: requiredString(body, "email_body"),
      subject: optionalString(body, "subject") ?? "",
      borrowerName: optionalString(body, "borrower_name"),
      context: contextOf(body),
    });
    return { success: true, reply, model: generator.model, timestamp: new Date().toISOString() };
  });

  app.post<{ Body: unknown }>("/auto-reply/to-borrower", async (request) => {
    const generator = requireGenerator();
    const body = bodyOf(request.body);
    const emailId = requiredString(body, "email_id");

    const email = await provider.getEmail(emailId);
    const senderAccount = optionalString(body, "eaccount") ?? email.senderAccount;
    if (!senderAccount) throw new BadRequestError(`eaccount is required; email ${emailId} does not carry one`);

    const reply = await generator.generate({
      emailBody: email.bodyText,
      subject: email.subject,
      borrowerName: optionalString(body, "borrower_name"),
      context: contextOf(body),
    });
    const deliveryId = await dispatcher.deliver({
      itemId: emailId,
      subject: email.subject,
      body: reply,
      htmlBody: textToHtml(reply),
      senderAccount,
    });
    request.log.info({ emailId, deliveryId }, "auto-reply sent");
    return { ...emailResponse(`AI auto-reply sent successfully (Model: ${generator.model})`, deliveryId), reply };
  });

  app.post<{ Body: unknown }>("/send-email", async (request) => {
    const body = bodyOf(request.body);
    const to = requiredString(body, "to");
    if (!EMAIL_ADDRESS.test(to)) throw new BadRequestError(`to must be an email address (got '${to}')`);

    const campaignId = await dispatcher.sendEmail({
      to,
      subject: requiredString(body, "subject"),
      body: requiredString(body, "body"),
      htmlBody: optionalString(body, "html_body"),
      senderAccount: optionalString(body, "eaccount"),
    });
    request.log.info({ to, campaignId }, "quick-send campaign activated");
    return emailResponse("Email sent successfully", campaignId);
  });

  app.post<{ Body: unknown }>("/reply-email", async (request) => {
    const body = bodyOf(request.body);
    const emailId = requiredString(body, "email_id");
    const text = requiredString(body, "body");
    let subject = optionalString(body, "subject");
    let senderAccount = optionalString(body, "eaccount");

    if (subject === null || senderAccount === null) {
      const email = await provider.getEmail(emailId);
      subject = subject ?? email.subject;
      senderAccount = senderAccount ?? email.senderAccount;
    }
    if (!senderAccount) throw new BadRequestError(`eaccount is required; email ${emailId} does not carry one`);

    const deliveryId = await dispatcher.deliver({
      itemId: emailId,
      subject,
      body: text,
      htmlBody: optionalString(body, "html_body"),
      senderAccount,
    });
    return emailResponse("Reply sent successfully", deliveryId);
  });

  return app;
}
