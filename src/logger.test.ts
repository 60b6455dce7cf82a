import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createFileDestination, createLogger, toMonitorLogger } from "./logger.js";

describe("createFileDestination", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pulsewatch-log-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("has written each line by the time the log call returns", async () => {
    const path = join(dir, "nested", "pulsewatch.log");
    const logger = toMonitorLogger(createLogger("info", createFileDestination(path)));

    logger.info("Received SIGINT, shutting down...");

    const lines = (await readFile(path, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      level: 30,
      msg: "Received SIGINT, shutting down...",
    });
  });

  it("redacts the access token", async () => {
    const path = join(dir, "pulsewatch.log");
    const log = createLogger("info", createFileDestination(path));

    log.info({ accessToken: "test-token" }, "connecting");

    const entry: unknown = JSON.parse((await readFile(path, "utf-8")).trim());
    expect(entry).toMatchObject({ accessToken: "[redacted]", msg: "connecting" });
  });
});
