import { describe, expect, it } from "vitest";
import { NotFoundError } from "../errors";
import { fakeTime } from "../testing/fakes";
import { JobTracker } from "./jobTracker";

function tracker() {
  const time = fakeTime();
  let n = 0;
  const jobs = new JobTracker({ now: time.now, newId: () => `job-${++n}` });
  return { jobs, advance: time.advance };
}

describe("JobTracker", () => {
  it("creates a processing job with empty progress", () => {
    const { jobs } = tracker();
    const job = jobs.create({ scope: "campaign", campaignName: "Spring Settlements" });

    expect(job).toEqual({
      id: "job-1",
      status: "processing",
      scope: "campaign",
      campaignName: "Spring Settlements",
      total: 0,
      current: 0,
      currentItem: null,
      logs: [],
      results: [],
      skippedItems: [],
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z",
    });
  });

  it("timestamps log lines and bumps updatedAt", () => {
    const { jobs, advance } = tracker();
    const { id } = jobs.create({ scope: "all" });
    advance(1500);
    jobs.log(id, "Fetching all unread emails");

    const job = jobs.get(id);
    expect(job.logs).toEqual(["2026-01-01T00:00:01.500Z Fetching all unread emails"]);
    expect(job.updatedAt).toBe("2026-01-01T00:00:01.500Z");
  });

  it("counts one processed item per recorded outcome", () => {
    const { jobs } = tracker();
    const { id } = jobs.create({ scope: "all" });
    jobs.setTotal(id, 2);
    jobs.recordOutcome(id, { itemId: "a", sourceIdentity: null, subject: "Loan", status: "generated_only" });
    jobs.recordSkipped(id, { itemId: "b", sourceIdentity: null, reason: "already_processed" });

    const job = jobs.get(id);
    expect(job.current).toBe(1);
    expect(job.total).toBe(2);
    expect(job.skippedItems).toEqual([{ itemId: "b", sourceIdentity: null, reason: "already_processed" }]);
  });

  it("finalizes once and stamps finishedAt", () => {
    const { jobs, advance } = tracker();
    const { id } = jobs.create({ scope: "all" });
    jobs.setCurrentItem(id, "a");
    advance(2000);

    expect(jobs.finalize(id, "completed")).toBe(true);
    expect(jobs.finalize(id, "error", "late failure")).toBe(false);

    const job = jobs.get(id);
    expect(job.status).toBe("completed");
    expect(job.currentItem).toBeNull();
    expect(job.finishedAt).toBe("2026-01-01T00:00:02.000Z");
    expect(job.error).toBeUndefined();
  });

  it("records a fallback message for errors without one", () => {
    const { jobs } = tracker();
    const { id } = jobs.create({ scope: "all" });
    jobs.finalize(id, "error");

    expect(jobs.get(id).error).toBe("Unknown error");
  });

  it("reports unknown jobs", () => {
    const { jobs } = tracker();
    expect(() => jobs.get("missing")).toThrow(NotFoundError);
    expect(() => jobs.get("missing")).toThrow("Job missing not found");
    expect(jobs.find("missing")).toBeNull();
  });

  it("lists newest first and hands out copies", () => {
    const { jobs, advance } = tracker();
    jobs.create({ scope: "all" });
    advance(1000);
    jobs.create({ scope: "campaign", campaignName: "Spring Settlements" });

    expect(jobs.list().map((j) => j.id)).toEqual(["job-2", "job-1"]);

    const snapshot = jobs.get("job-1");
    snapshot.logs.push("tampered");
    expect(jobs.get("job-1").logs).toEqual([]);
  });
});
