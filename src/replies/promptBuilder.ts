import policy from "./borrowerPolicy.json";
import { ReplyRequest } from "../types";

export interface PromptBrand {
  companyName: string;
  whatsappNumber: string;
}

export interface BorrowerIntent {
  name: string;
  examples: string[];
  nextSteps: string[];
  primaryCta: string;
}

const DEFAULT_BORROWER_NAME = "Valued Borrower";

const currency = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

function fill(template: string, brand: PromptBrand): string {
  return template.replace(/\{company\}/g, brand.companyName).replace(/\{whatsapp\}/g, brand.whatsappNumber);
}

/** Intents in priority order (highest first), with brand placeholders filled in. */
export function borrowerIntents(brand: PromptBrand): BorrowerIntent[] {
  const intents: BorrowerIntent[] = policy.intents;
  return intents.map((intent) => ({
    name: fill(intent.name, brand),
    examples: intent.examples.map((e) => fill(e, brand)),
    nextSteps: intent.nextSteps.map((s) => fill(s, brand)),
    primaryCta: fill(intent.primaryCta, brand),
  }));
}

export function whatsappCta(brand: PromptBrand): string {
  return `Any query you can whatsapp us on ${brand.whatsappNumber}.`;
}

export function buildSystemPrompt(brand: PromptBrand): string {
  return [
    `You are ${brand.companyName}'s empathetic borrower-support assistant.`,
    "Read ONLY the borrower's latest message in the email thread and respond with warmth, clarity, certainty, and one clear next step.",
    "Your goal: help borrowers feel safe, respected, and guided, while ensuring accurate next steps based on their intent.",
    `ALWAYS include the secondary CTA: '${whatsappCta(brand)}'`,
    "Never mention categories, classification, rules, or internal logic.",
    "Never sound legalistic, threatening, or robotic.",
    "Always be supportive, calm, and human. Use simple language.",
    "Replies must be 3-5 warm lines with a single primary CTA plus the required secondary CTA.",
  ].join(" ");
}

// "loan_amount" -> "Loan Amount"
export function contextLabel(key: string): string {
  return key.replace(/_/g, " ").replace(/[a-zA-Z]+/g, (w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase());
}

export function contextValue(value: unknown): string {
  if (typeof value === "number" && Number.isFinite(value) && !Number.isInteger(value)) {
    return currency.format(value);
  }
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

export function formatContext(context: Record<string, unknown>): string[] {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(context)) {
    if (value === null || value === undefined) continue;
    lines.push(`${contextLabel(key)}: ${contextValue(value)}`);
  }
  return lines;
}

export function resolveBorrowerName(request: ReplyRequest): string {
  const fromContext = request.context.borrower_name;
  if (request.borrowerName && request.borrowerName.trim()) return request.borrowerName.trim();
  if (typeof fromContext === "string" && fromContext.trim()) return fromContext.trim();
  return DEFAULT_BORROWER_NAME;
}

function actionRuleLines(intents: BorrowerIntent[]): string[] {
  const lines: string[] = [];
  for (const intent of intents) {
    lines.push("", `${intent.name}:`, "  Next Steps (format as bullet points in response):");
    for (const step of intent.nextSteps) lines.push(`    • ${step}`);
    lines.push(`  Primary CTA: ${intent.primaryCta}`);
  }
  return lines;
}

export function buildUserPrompt(request: ReplyRequest, brand: PromptBrand): string {
  const intents = borrowerIntents(brand);
  const contextLines = formatContext(request.context);

  const lines: string[] = [];
  lines.push("STEP 1 - INTENT CLASSIFICATION:");
  lines.push(
    "Classify the borrower's LAST message in the email thread into exactly ONE of these intents. Use the priority order below. Even if multiple intents appear, choose the most relevant/highest priority intent."
  );
  lines.push("");
  lines.push("Priority Order (highest to lowest):");
  lines.push(intents.map((i) => i.name).join(", "));
  lines.push("");
  lines.push("Category Examples:");
  for (const intent of intents) lines.push(`${intent.name}: ${intent.examples.join(", ")}`);
  lines.push("");
  lines.push(`Borrower Name: ${resolveBorrowerName(request)}`);
  lines.push(`Email Subject: ${request.subject}`);
  lines.push(`Email Content: ${request.emailBody}`);
  if (contextLines.length > 0) {
    lines.push("", "Additional Context:", ...contextLines);
  }

  lines.push("");
  lines.push("STEP 2 - GENERATE RESPONSE:");
  lines.push("Based on the classified intent, generate a response using the EXACT action rules below. The response must be:");
  lines.push("- 3-5 warm, empathetic lines (format next steps as concise bullet points)");
  lines.push("- Always give clear certainty about next steps (use bullet points for clarity)");
  lines.push("- End with ONE primary CTA from the action rules");
  lines.push(`- After the primary CTA, ALWAYS add: "${whatsappCta(brand)}"`);
  lines.push("- Do NOT output category names");
  lines.push("- Do NOT mention classification, logic, rules, internal system, or AI");
  lines.push("- Do NOT pressure or sound legalistic");
  lines.push("- NEVER commit any timeline for NOC issuance. Do not mention days, weeks, or any time period for NOC");
  lines.push("- Use simple language, be supportive, calm, and human");
  lines.push("");
  lines.push("Action Rules:");
  lines.push(...actionRuleLines(intents));
  lines.push("");
  lines.push("STEP 3 - OUTPUT:");
  lines.push(
    "Output ONLY the email body. No labels, no JSON, no explanations. Just the warm, empathetic reply with certainty (using bullet points for next steps), primary CTA, and WhatsApp CTA."
  );

  return lines.join("\n");
}
