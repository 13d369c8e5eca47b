import { describe, expect, it } from "vitest";
import { Logger, createMemorySink } from "../lib/logging/logger";

const clock = () => new Date("2024-05-06T07:08:09.000Z");

describe("Logger", () => {
  it("writes timestamped lines at or above its level", () => {
    const sink = createMemorySink();
    const logger = new Logger(sink, { level: "WARNING", clock });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warning("careful");
    logger.error("broken");
    logger.critical("down");

    expect(sink.lines).toEqual([
      "2024-05-06T07:08:09.000Z - WARNING - careful",
      "2024-05-06T07:08:09.000Z - ERROR - broken",
      "2024-05-06T07:08:09.000Z - CRITICAL - down"
    ]);
  });

  it("defaults to INFO", () => {
    const logger = new Logger(createMemorySink());

    expect(logger.isEnabled("DEBUG")).toBe(false);
    expect(logger.isEnabled("INFO")).toBe(true);
  });

  it("nests child contexts and shares the sink", () => {
    const sink = createMemorySink();
    const logger = new Logger(sink, { level: "DEBUG", clock }).child("run").child("write");

    logger.debug("flushing");

    expect(sink.lines).toEqual(["2024-05-06T07:08:09.000Z - DEBUG - [run:write] flushing"]);
  });
});
