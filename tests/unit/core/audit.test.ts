import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFile, readFile } from "node:fs/promises";
import { join } from "node:path";
import { AuditLog } from "../../../src/core/audit.js";
import { createMockLogger } from "../../helpers/mocks.js";
import { TempDirManager } from "../../helpers/temp-dir.js";

describe("AuditLog", () => {
  const tempDirs = new TempDirManager();
  let path: string;
  let now: Date;
  let audit: AuditLog;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(async () => {
    path = join(await tempDirs.create(), "vault", "Audit_Log.jsonl");
    now = new Date("2026-03-14T12:00:00.000Z");
    logger = createMockLogger();
    audit = new AuditLog(path, logger, () => now);
  });

  afterEach(async () => {
    await tempDirs.cleanupAll();
  });

  it("appends one JSON line per entry with snake_case keys", async () => {
    await audit.record({ taskId: "t1", eventType: "created", detail: "from gmail", statusAfter: "new" });

    const content = await readFile(path, "utf-8");
    expect(content).toBe(
      '{"timestamp":"2026-03-14T12:00:00.000Z","task_id":"t1","event_type":"created","detail":"from gmail","status_after":"new"}\n'
    );
  });

  it("reads entries back in order", async () => {
    await audit.record({ taskId: "t1", eventType: "created", detail: "", statusAfter: "new" });
    await audit.record({ taskId: "t1", eventType: "classified", detail: "business/post/medium", statusAfter: "new" });

    const entries = await audit.read();
    expect(entries.map((e) => e.eventType)).toEqual(["created", "classified"]);
    expect(entries[1]).toEqual({
      timestamp: "2026-03-14T12:00:00.000Z",
      taskId: "t1",
      eventType: "classified",
      detail: "business/post/medium",
      statusAfter: "new",
    });
  });

  it("keeps every entry when writes are concurrent", async () => {
    await Promise.all(
      Array.from({ length: 50 }, (_, i) =>
        audit.record({ taskId: `t${i}`, eventType: "attempt", detail: `attempt ${i}`, statusAfter: "in_progress" })
      )
    );

    const lines = (await readFile(path, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(50);
    expect(lines.every((line) => JSON.parse(line).event_type === "attempt")).toBe(true);
    expect((await audit.read()).map((e) => e.taskId)).toEqual(Array.from({ length: 50 }, (_, i) => `t${i}`));
  });

  it("filters by task, event type and time", async () => {
    await audit.record({ taskId: "t1", eventType: "created", detail: "", statusAfter: "new" });
    now = new Date("2026-03-15T12:00:00.000Z");
    await audit.record({ taskId: "t2", eventType: "created", detail: "", statusAfter: "new" });
    await audit.record({ taskId: "t2", eventType: "failure", detail: "boom", statusAfter: "failed" });
    await audit.record({ taskId: null, eventType: "report_generated", detail: "weekly", statusAfter: null });

    expect((await audit.forTask("t2")).map((e) => e.eventType)).toEqual(["created", "failure"]);
    expect(await audit.read({ eventType: "failure" })).toHaveLength(1);
    expect(await audit.read({ since: new Date("2026-03-15T00:00:00.000Z") })).toHaveLength(3);
    expect(await audit.read({ until: new Date("2026-03-15T00:00:00.000Z") })).toHaveLength(1);
  });

  it("returns nothing when the log does not exist yet", async () => {
    expect(await audit.read()).toEqual([]);
  });

  it("skips unreadable lines", async () => {
    await audit.record({ taskId: "t1", eventType: "created", detail: "", statusAfter: "new" });
    await appendFile(path, "not json\n");
    await appendFile(path, '{"timestamp":"x","task_id":"t1","event_type":"unknown","detail":"","status_after":null}\n');
    await audit.record({ taskId: "t1", eventType: "success", detail: "", statusAfter: "done" });

    expect((await audit.read()).map((e) => e.eventType)).toEqual(["created", "success"]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });
});
