export interface MailItem {
  id: string;
  threadId: string | null;
  senderAddress: string | null; // the borrower (lead) who wrote in
  senderAccount: string | null; // our mailbox that received it; replies go out from here
  subject: string;
  bodyText: string;
  campaignId: string | null;
  isSentItem: boolean; // provider echo of our own outbound mail
}

export type FetchScope = { kind: "all" } | { kind: "campaign"; campaignId: string };

export interface SendReplyInput {
  itemId: string;
  subject: string;
  body: string;
  htmlBody: string | null;
  senderAccount: string;
}

// A new outbound email to an address with no thread yet.
export interface SendEmailInput {
  to: string;
  subject: string;
  body: string;
  htmlBody: string | null;
  senderAccount: string | null;
}

export interface MailProvider {
  fetchPending(scope: FetchScope, limit: number): Promise<MailItem[]>;
  resolveCampaign(name: string): Promise<string>;
  sendReply(input: SendReplyInput): Promise<string>;
  /** Creates a one-lead campaign carrying the email; returns the campaign id. */
  createQuickSendCampaign(input: SendEmailInput): Promise<string>;
  activateCampaign(campaignId: string): Promise<void>;
}

export interface ReplyRequest {
  emailBody: string;
  subject: string;
  borrowerName: string | null;
  context: Record<string, unknown>;
}

export interface ReplyGenerator {
  readonly model: string;
  generate(request: ReplyRequest): Promise<string>;
}

export type JobStatus = "processing" | "completed" | "error";
export type TerminalJobStatus = Exclude<JobStatus, "processing">;
export type JobScope = "all" | "campaign";

export type OutcomeStatus = "generated_only" | "approved" | "error";

export interface ItemOutcome {
  itemId: string;
  sourceIdentity: string | null;
  subject: string;
  generatedReply?: string;
  status: OutcomeStatus;
  errorDetail?: string;
  deliveryId?: string;
}

export type SkipReason = "already_processed" | "duplicate_in_batch" | "sent_item";

export interface SkippedItem {
  itemId: string;
  sourceIdentity: string | null;
  reason: SkipReason;
}

export interface Job {
  id: string;
  status: JobStatus;
  scope: JobScope;
  campaignName: string | null;
  total: number;
  current: number;
  currentItem: string | null;
  logs: string[];
  results: ItemOutcome[];
  skippedItems: SkippedItem[];
  error?: string;
  createdAt: string;
  updatedAt: string;
  finishedAt?: string;
}
