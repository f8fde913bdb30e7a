import { describe, expect, it } from "vitest";
import { createLogger, warnOnce } from "../src/utils/logger.js";
import { recordingLogger } from "./test-data.js";

describe("createLogger", () => {
  it("writes prefixed lines at or above the configured level", () => {
    const recorder = recordingLogger();
    const logger = createLogger({ level: "info", stream: recorder.stream });

    logger.debug("hidden");
    logger.info("loaded 3 rules");
    logger.error("failed");

    expect(recorder.lines).toEqual(["[info] loaded 3 rules\n", "[error] failed\n"]);
  });

  it("writes nothing when silent", () => {
    const recorder = recordingLogger();
    const logger = createLogger({ level: "silent", stream: recorder.stream });

    logger.error("failed");

    expect(recorder.lines).toEqual([]);
  });
});

describe("warnOnce", () => {
  it("remembers messages per logger", () => {
    const first = recordingLogger();
    const second = recordingLogger();
    const a = createLogger({ stream: first.stream });
    const b = createLogger({ stream: second.stream });

    warnOnce(a, "duplicate");
    warnOnce(a, "duplicate");
    warnOnce(b, "duplicate");

    expect(first.lines).toEqual(["[warn] duplicate\n"]);
    expect(second.lines).toEqual(["[warn] duplicate\n"]);
  });
});
