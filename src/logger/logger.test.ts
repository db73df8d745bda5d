import { describe, test, expect } from "vitest";
import { createLogger, shouldLog } from "./logger";
import { createRecordingSink } from "#/test-utils/mocks";

describe("shouldLog", () => {
  test("compares levels by severity", () => {
    expect(shouldLog("debug", "info")).toBe(false);
    expect(shouldLog("info", "info")).toBe(true);
    expect(shouldLog("error", "warn")).toBe(true);
  });
});

describe("createLogger", () => {
  test("drops messages below the threshold", () => {
    const sink = createRecordingSink();
    const logger = createLogger("warn", sink);

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(sink.lines).toEqual([]);
    expect(sink.errors).toHaveLength(1);
    expect(sink.errors[0]).toContain("[WARN] shown");
  });

  test("writes debug and info to the log stream", () => {
    const sink = createRecordingSink();
    const logger = createLogger("debug", sink);

    logger.debug("Pushing referrer to ghcr.io/example/app@sha256:abc");
    logger.info("done");

    expect(sink.lines).toHaveLength(2);
    expect(sink.lines[0]).toContain("[DEBUG] Pushing referrer to ghcr.io/example/app@sha256:abc");
    expect(sink.lines[1]).toBe("[INFO] done");
  });

  test("writes errors to the error stream", () => {
    const sink = createRecordingSink();

    createLogger("info", sink).error("failed");

    expect(sink.errors[0]).toContain("[ERROR] failed");
  });
});
