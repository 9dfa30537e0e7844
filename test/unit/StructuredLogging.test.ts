/**
 * Unit tests for step logging.
 *
 * Tests Step, StepTimer and formatDuration.
 *
 * @module
 */

import { describe, it, expect } from "vitest";

import { Step } from "../../src/core/logging/Step.js";
import { StepTimer, formatDuration } from "../../src/core/logging/StepTimer.js";

// =============================================================================
// Test Helpers
// =============================================================================

function createTestLogger(): { verbose: (message: string) => void; messages: string[] } {
  const messages: string[] = [];
  return { verbose: (message) => messages.push(message), messages };
}

/**
 * A clock that returns the given readings in order, then repeats the last.
 */
function fakeClock(...readings: number[]): () => number {
  let index = 0;
  return () => readings[Math.min(index++, readings.length - 1)];
}

// =============================================================================
// Tests
// =============================================================================

describe("Step", () => {
  it("has stable names", () => {
    expect(Step.CONFIG_LOAD).toBe("config.load");
    expect(Step.BUILD).toBe("build");
    expect(Step.STAGING).toBe("staging");
    expect(Step.LAUNCH).toBe("launch");
  });
});

describe("StepTimer", () => {
  it("logs start and completion with the duration", () => {
    const logger = createTestLogger();
    const timer = new StepTimer(logger, fakeClock(1000, 1250));

    timer.start(Step.STAGING, "2 artifacts");
    timer.end(Step.STAGING);
    // A finished step is forgotten, so a second end() logs nothing
    timer.end(Step.STAGING);

    expect(logger.messages).toEqual(["[staging] started: 2 artifacts", "[staging] completed in 250ms"]);
  });

  it("ignores end() for a step that never started", () => {
    const logger = createTestLogger();
    const timer = new StepTimer(logger);

    timer.end(Step.BUILD);

    expect(logger.messages).toEqual([]);
  });

  it("run() times a successful function and returns its value", async () => {
    const logger = createTestLogger();
    const timer = new StepTimer(logger, fakeClock(0, 1500));

    const value = await timer.run(Step.BUILD, async () => 42);

    expect(value).toBe(42);
    expect(logger.messages).toEqual(["[build] started", "[build] completed in 1.50s"]);
  });

  it("run() logs a failure and rethrows", async () => {
    const logger = createTestLogger();
    const timer = new StepTimer(logger, fakeClock(0, 30));

    await expect(
      timer.run(Step.LAUNCH, async () => {
        throw new Error("emulator crashed");
      }),
    ).rejects.toThrow("emulator crashed");

    expect(logger.messages).toEqual(["[launch] started", "[launch] failed after 30ms"]);
  });
});

describe("formatDuration", () => {
  it("uses milliseconds below one second", () => {
    expect(formatDuration(0)).toBe("0ms");
    expect(formatDuration(999)).toBe("999ms");
  });

  it("uses seconds with two decimals from one second up", () => {
    expect(formatDuration(1000)).toBe("1.00s");
    expect(formatDuration(12340)).toBe("12.34s");
  });
});
