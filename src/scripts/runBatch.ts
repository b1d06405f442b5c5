#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "../config";
import { sleep } from "../batch/time";
import { buildRuntime } from "../runtime";
import { Job } from "../types";
import { parseBatchArgs } from "./batchArgs";

const POLL_INTERVAL_MS = 1000;

function printOutcomes(job: Job) {
  for (const r of job.results) {
    const detail = r.status === "error" ? r.errorDetail ?? "" : r.deliveryId ?? "";
    console.log(`${r.status.padEnd(15)} ${r.itemId}  ${r.sourceIdentity ?? "-"}  ${detail}`);
  }
  for (const s of job.skippedItems) {
    console.log(`${"skipped".padEnd(15)} ${s.itemId}  ${s.sourceIdentity ?? "-"}  ${s.reason}`);
  }
}

async function main() {
  const args = parseBatchArgs(process.argv.slice(2));
  const { tracker, orchestrator } = buildRuntime(loadConfig());
  if (!orchestrator) {
    throw new Error("Reply generation is disabled; set OPENAI_API_KEY and SUPPORT_WHATSAPP");
  }

  const jobId = orchestrator.submit({ ...args, context: {} });
  console.log(`[batch] submitted job ${jobId}`);

  let printed = 0;
  const flush = () => {
    const job = tracker.get(jobId);
    for (const line of job.logs.slice(printed)) console.log(line);
    printed = job.logs.length;
    return job;
  };

  while (flush().status === "processing") {
    await sleep(POLL_INTERVAL_MS);
  }
  await orchestrator.settled(jobId);

  const job = flush();
  printOutcomes(job);
  if (job.status === "error") {
    console.error(`[batch] job ${jobId} failed: ${job.error ?? "Unknown error"}`);
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
