export interface BatchArgs {
  campaignName: string | null;
  autoReply: boolean;
  borrowerName: string | null;
}

export const BATCH_USAGE = "usage: run-batch [--campaign NAME] [--send] [--borrower NAME]";

export function parseBatchArgs(argv: string[]): BatchArgs {
  const args: BatchArgs = { campaignName: null, autoReply: false, borrowerName: null };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--send") {
      args.autoReply = true;
      continue;
    }
    if (arg === "--campaign" || arg === "--borrower") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--") || !value.trim()) {
        throw new Error(`${arg} needs a value\n${BATCH_USAGE}`);
      }
      if (arg === "--campaign") args.campaignName = value.trim();
      else args.borrowerName = value.trim();
      i += 1;
      continue;
    }
    throw new Error(`Unknown argument: ${arg}\n${BATCH_USAGE}`);
  }

  return args;
}
