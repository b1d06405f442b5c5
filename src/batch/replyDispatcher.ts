import { MailProvider, SendEmailInput, SendReplyInput } from "../types";
import { DedupCache } from "./dedupCache";
import { SlidingWindowRateLimiter } from "./rateLimiter";
import { RetryAttemptInfo, RetryPolicy, runWithRetry } from "./retry";
import { Sleep } from "./time";

export function textToHtml(text: string): string {
  const escaped = text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
  return `<p>${escaped.replace(/\r?\n/g, "<br>")}</p>`;
}

export function describeRetry(label: string, info: RetryAttemptInfo): string {
  return `Rate limited during ${label}; waiting ${Math.round(info.delayMs / 1000)}s before retry ${info.attempt + 1}/${
    info.maxAttempts
  }`;
}

/**
 * The single outbound path. Every provider call, retries included, takes a
 * rate-limiter slot; an accepted reply is recorded in the dedup cache
 * before the delivery id is returned.
 */
export class ReplyDispatcher {
  constructor(
    private readonly deps: {
      provider: MailProvider;
      limiter: SlidingWindowRateLimiter;
      dedup: DedupCache;
      retry: RetryPolicy;
      sleep?: Sleep;
    }
  ) {}

  async deliver(input: SendReplyInput, onRetryLine?: (line: string) => void): Promise<string> {
    const { provider, dedup } = this.deps;
    const deliveryId = await this.limited(`reply to ${input.itemId}`, () => provider.sendReply(input), onRetryLine);
    dedup.markProcessed(input.itemId);
    return deliveryId;
  }

  /**
   * Sends a fresh email as a one-lead campaign. Creation and activation are
   * retried separately so a throttled activation never creates a second
   * campaign. Returns the campaign id.
   */
  async sendEmail(input: SendEmailInput, onRetryLine?: (line: string) => void): Promise<string> {
    const { provider } = this.deps;
    const campaignId = await this.limited(
      `quick send to ${input.to}`,
      () => provider.createQuickSendCampaign(input),
      onRetryLine
    );
    await this.limited(`activation of campaign ${campaignId}`, () => provider.activateCampaign(campaignId), onRetryLine);
    return campaignId;
  }

  private limited<T>(label: string, call: () => Promise<T>, onRetryLine?: (line: string) => void): Promise<T> {
    const { limiter } = this.deps;
    return runWithRetry(
      async () => {
        await limiter.acquire();
        return call();
      },
      {
        ...this.deps.retry,
        sleep: this.deps.sleep,
        onRetry: (info) => {
          const line = describeRetry(label, info);
          if (onRetryLine) onRetryLine(line);
          else console.warn(`[batch] ${line}`);
        },
      }
    );
  }
}
