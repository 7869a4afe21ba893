import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { describe, expect, it, vi } from "vitest";
import { ConsoleLogger, JsonlFileLogger, TeeLogger, isLogLevel } from "./logger.js";

describe("ConsoleLogger", () => {
  it("drops entries below its level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: "warn" });
    logger.info("hidden");
    logger.warn("Upserted vectors", { count: 3 });
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T.+ \[WARN\] Upserted vectors$/);
    expect(warn.mock.calls[0][1]).toEqual({ count: 3 });
  });
});

describe("JsonlFileLogger", () => {
  it("appends one JSON object per line, in order", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "sermon-log-"));
    try {
      const file = path.join(dir, "logs", "ingestion.log.jsonl");
      const logger = new JsonlFileLogger(file, { level: "info" });
      logger.debug("skipped");
      logger.info("Upserted vectors", { count: 8 });
      logger.error("Could not embed sermon", { title: "Grace" });
      await logger.flush();

      const lines = (await readFile(file, "utf-8")).trim().split("\n").map((l) => JSON.parse(l) as object);
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatchObject({ level: "info", message: "Upserted vectors", count: 8 });
      expect(lines[1]).toMatchObject({ level: "error", message: "Could not embed sermon", title: "Grace" });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("TeeLogger", () => {
  it("forwards to every target", () => {
    const a = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const b = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    new TeeLogger(a, b).error("boom", { code: 1 });
    expect(a.error).toHaveBeenCalledWith("boom", { code: 1 });
    expect(b.error).toHaveBeenCalledWith("boom", { code: 1 });
  });
});

it("recognizes log levels", () => {
  expect(isLogLevel("debug")).toBe(true);
  expect(isLogLevel("verbose")).toBe(false);
});
