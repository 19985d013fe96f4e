import { describe, it, expect, vi } from "vitest";
import { OutcomeSet, classify, logOutcome, reportOutcome, formatOutcome } from "./outcome.js";
import type { DownloadTarget } from "./file-plan.js";
import type { Logger } from "./logger.js";

function target(day: string): DownloadTarget {
  const relativePath = `v1.0/30min/8km/2022/02/CMORPH_V1.0_ADJ_8km-30min_202202${day}00.nc`;
  return {
    remoteUrl: `https://archive.test/cmorph_${relativePath}`,
    localPath: `/data/${relativePath}`,
    relativePath,
    year: "2022",
    month: "02",
    day,
  };
}

function mockLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn((): Logger => logger),
  };
  return logger;
}

describe("outcome", () => {
  describe("classify", () => {
    it.each([
      ["complete", false, "new"],
      ["complete", true, "updated"],
      ["incomplete", false, "error"],
      ["incomplete", true, "error"],
      ["skip", true, undefined],
    ] as const)("%s (update=%s) → %s", (status, update, bucket) => {
      expect(classify(status, update)).toBe(bucket);
    });
  });

  describe("OutcomeSet", () => {
    it("keeps insertion order and omits skipped targets", () => {
      const outcomes = new OutcomeSet();
      outcomes.record(target("03"), "complete", false);
      outcomes.record(target("01"), "complete", false);
      outcomes.record(target("02"), "skip", true);
      outcomes.record(target("04"), "complete", true);
      outcomes.record(target("05"), "incomplete", true);

      expect(outcomes.new).toEqual([target("03").relativePath, target("01").relativePath]);
      expect(outcomes.updated).toEqual([target("04").relativePath]);
      expect(outcomes.error).toEqual([target("05").relativePath]);
    });

    it("serializes to the JSON summary document", () => {
      const outcomes = new OutcomeSet();
      outcomes.record(target("01"), "complete", false);

      expect(outcomes.toJSON()).toEqual({
        success: true,
        data: {
          updated: [],
          new: [target("01").relativePath],
          error: [],
          summary: { updated: 0, new: 1, error: 0 },
        },
      });
    });
  });

  describe("logOutcome", () => {
    it("writes one record per bucket with the identifiers", () => {
      const outcomes = new OutcomeSet();
      outcomes.record(target("01"), "complete", false);
      outcomes.record(target("02"), "incomplete", false);
      const logger = mockLogger();

      logOutcome(outcomes, logger);

      expect(logger.info.mock.calls).toEqual([
        ["Updated files: 0"],
        ["New files: 1", { files: [target("01").relativePath] }],
      ]);
      expect(logger.warn).toHaveBeenCalledWith("Incomplete files: 1", {
        files: [target("02").relativePath],
      });
    });
  });

  describe("reportOutcome", () => {
    it("prints JSON when asked", () => {
      const outcomes = new OutcomeSet();
      outcomes.record(target("01"), "complete", true);
      const write = vi.fn();

      reportOutcome(outcomes, { logger: mockLogger(), json: true, write });

      expect(write).toHaveBeenCalledTimes(1);
      expect(JSON.parse(write.mock.calls[0][0]).data.updated).toEqual([
        target("01").relativePath,
      ]);
    });

    it("prints the table and file lists otherwise", () => {
      const outcomes = new OutcomeSet();
      outcomes.record(target("07"), "incomplete", false);
      const write = vi.fn();

      reportOutcome(outcomes, { logger: mockLogger(), write });

      expect(write).toHaveBeenCalledWith(formatOutcome(outcomes));
      expect(write.mock.calls[0][0]).toContain(target("07").relativePath);
      expect(write.mock.calls[0][0]).toContain("Sync summary:");
    });
  });
});
