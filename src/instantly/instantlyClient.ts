import { NotFoundError, ProviderError, RateLimitedError, errorMessage } from "../errors";
import { Sleep, sleep as systemSleep } from "../batch/time";
import { FetchScope, MailItem, MailProvider, SendEmailInput, SendReplyInput } from "../types";

export interface InstantlyClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
  serverErrorRetries?: number;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
}

export interface InstantlyCampaign {
  id: string;
  name: string;
}

type RawInstantlyEmail = {
  id?: unknown;
  thread_id?: unknown;
  lead?: unknown;
  eaccount?: unknown;
  subject?: unknown;
  body?: unknown;
  campaign_id?: unknown;
  ue_type?: unknown;
};

type RawInstantlyCampaign = { id?: unknown; name?: unknown };

type Query = Record<string, string | number | boolean | undefined>;

// ue_type 1 marks an email we sent, not one we received.
const UE_TYPE_SENT = 1;

const ALL_WEEK = { "0": true, "1": true, "2": true, "3": true, "4": true, "5": true, "6": true };

function str(v: unknown): string | null {
  if (typeof v === "string") return v.trim() ? v : null;
  if (typeof v === "number") return String(v);
  return null;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function itemsOf(json: unknown): unknown[] {
  if (Array.isArray(json)) return json;
  if (isRecord(json) && Array.isArray(json.items)) return json.items;
  return [];
}

export function toMailItem(raw: RawInstantlyEmail): MailItem {
  const body: Record<string, unknown> = isRecord(raw.body) ? raw.body : {};
  return {
    id: str(raw.id) ?? "",
    threadId: str(raw.thread_id),
    senderAddress: str(raw.lead),
    senderAccount: str(raw.eaccount),
    subject: str(raw.subject) ?? "",
    bodyText: str(body.text) ?? str(body.html) ?? "",
    campaignId: str(raw.campaign_id),
    isSentItem: raw.ue_type === UE_TYPE_SENT,
  };
}

export function replySubject(subject: string): string {
  const original = subject.trim();
  if (!original) return original;
  return /^re:/i.test(original) ? original : `Re: ${original}`;
}

function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}

function detailOf(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed) && typeof parsed.message === "string") return parsed.message;
  } catch {
    // not JSON; fall through to the raw body
  }
  return text.slice(0, 500) || "no response body";
}

/**
 * Instantly.ai API v2 client. Throttling (429) is surfaced as
 * RateLimitedError for the caller's retry policy; 5xx and network failures
 * are retried here.
 */
export class InstantlyClient implements MailProvider {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly serverErrorRetries: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;

  constructor(opts: InstantlyClientOptions) {
    this.apiKey = opts.apiKey;
    this.baseUrl = opts.baseUrl;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.serverErrorRetries = Math.max(1, opts.serverErrorRetries ?? 3);
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.sleep = opts.sleep ?? systemSleep;
  }

  async fetchPending(scope: FetchScope, limit: number): Promise<MailItem[]> {
    const json = await this.request("GET", "/api/v2/emails", { query: { limit, is_unread: true } });
    const mapped = itemsOf(json).filter(isRecord).map((raw) => toMailItem(raw));
    const items = mapped.filter((item) => item.id);
    if (items.length < mapped.length) {
      console.warn(`[instantly] dropped ${mapped.length - items.length} email(s) without an id`);
    }
    if (scope.kind === "all") return items;
    // The emails endpoint has no campaign filter, so narrow client-side.
    return items.filter((item) => item.campaignId === scope.campaignId);
  }

  async listCampaigns(limit = 100, offset = 0): Promise<InstantlyCampaign[]> {
    const json = await this.request("GET", "/api/v2/campaigns", { query: { limit, offset } });
    return itemsOf(json)
      .filter(isRecord)
      .map((raw: RawInstantlyCampaign) => ({ id: str(raw.id) ?? "", name: str(raw.name) ?? "" }))
      .filter((c) => c.id);
  }

  async resolveCampaign(name: string): Promise<string> {
    const campaigns = await this.listCampaigns(100);
    const match = campaigns.find((c) => c.name === name);
    if (!match) throw new NotFoundError(`Campaign '${name}' not found`);
    return match.id;
  }

  async getEmail(emailId: string): Promise<MailItem> {
    const json = await this.request("GET", `/api/v2/emails/${encodeURIComponent(emailId)}`);
    if (!isRecord(json)) throw new ProviderError(`Unexpected response for email ${emailId}`);
    return toMailItem(json);
  }

  async sendReply(input: SendReplyInput): Promise<string> {
    const body: { text: string; html?: string } = { text: input.body };
    if (input.htmlBody) body.html = input.htmlBody;

    const json = await this.request("POST", "/api/v2/emails/reply", {
      body: {
        reply_to_uuid: input.itemId,
        eaccount: input.senderAccount,
        subject: replySubject(input.subject),
        body,
      },
    });
    const id = isRecord(json) ? str(json.id) : null;
    if (!id) throw new ProviderError(`Instantly accepted the reply to ${input.itemId} but returned no email id`);
    return id;
  }

  async createQuickSendCampaign(input: SendEmailInput): Promise<string> {
    const json = await this.request("POST", "/api/v2/campaigns", {
      body: {
        name: `Quick Send - ${input.subject.slice(0, 50)}`,
        subject: input.subject,
        content: input.htmlBody ?? input.body,
        from_name: input.senderAccount ?? "Email Agent",
        eaccount: input.senderAccount,
        campaign_schedule: {
          schedules: [{ name: "Immediate Send", timing: { from: "00:00", to: "23:59" }, days: ALL_WEEK, timezone: "UTC" }],
        },
        leads: [{ email: input.to, first_name: "", last_name: "" }],
      },
    });
    const id = isRecord(json) ? str(json.id) : null;
    if (!id) throw new ProviderError(`Instantly created the quick-send campaign for ${input.to} but returned no id`);
    return id;
  }

  async activateCampaign(campaignId: string): Promise<void> {
    await this.request("POST", `/api/v2/campaigns/${encodeURIComponent(campaignId)}/activate`);
  }

  private async request(
    method: "GET" | "POST",
    endpoint: string,
    opts: { query?: Query; body?: unknown } = {}
  ): Promise<unknown> {
    const url = new URL(this.baseUrl + endpoint);
    for (const [k, v] of Object.entries(opts.query ?? {})) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }

    for (let attempt = 1; ; attempt++) {
      const canRetry = attempt < this.serverErrorRetries;
      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          method,
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            "Content-Type": "application/json",
          },
          ...(opts.body !== undefined ? { body: JSON.stringify(opts.body) } : {}),
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        if (canRetry) {
          await this.backoff(attempt, `network error on ${method} ${endpoint}: ${errorMessage(err)}`);
          continue;
        }
        throw new ProviderError(`Instantly request failed: ${errorMessage(err)}`, null, { cause: err });
      }

      if (res.ok) {
        const text = await res.text();
        if (!text.trim()) return {};
        try {
          return JSON.parse(text) as unknown;
        } catch (err) {
          throw new ProviderError(`Instantly returned invalid JSON for ${method} ${endpoint}`, res.status, { cause: err });
        }
      }

      const detail = detailOf(await res.text());
      if (res.status === 429) {
        throw new RateLimitedError(`Instantly rate limit exceeded: ${detail}`, parseRetryAfter(res.headers.get("retry-after")));
      }
      if (res.status >= 500 && canRetry) {
        await this.backoff(attempt, `server error ${res.status} on ${method} ${endpoint}`);
        continue;
      }
      if (res.status === 401) {
        throw new ProviderError(`Instantly API authentication failed; check INSTANTLY_API_KEY (${detail})`, 401);
      }
      if (res.status === 404) {
        throw new NotFoundError(`Instantly resource not found: ${method} ${endpoint} (${detail})`);
      }
      throw new ProviderError(`Instantly API error (status ${res.status}): ${detail}`, res.status);
    }
  }

  private async backoff(attempt: number, reason: string): Promise<void> {
    const waitMs = 2 ** attempt * 1000;
    console.warn(`[instantly] ${reason}; retrying in ${waitMs / 1000}s (attempt ${attempt + 1}/${this.serverErrorRetries})`);
    await this.sleep(waitMs);
  }
}
