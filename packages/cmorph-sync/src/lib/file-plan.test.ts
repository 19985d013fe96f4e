import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  buildFilePlan,
  daysInMonth,
  normalizeMonths,
  validateYear,
  ALL_MONTHS,
} from "./file-plan.js";

const BASE_URL = "https://rda.ucar.edu/data/ds502.2/";

describe("file-plan", () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), "cmorph-plan-"));
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  describe("daysInMonth", () => {
    it.each([
      [2022, 1, 31],
      [2022, 2, 28],
      [2024, 2, 29],
      [2000, 2, 29],
      [1900, 2, 28],
      [0, 2, 29],
      [99, 2, 28],
      [96, 2, 29],
      [2022, 4, 30],
      [2022, 12, 31],
    ])("%i-%i has %i days", (year, month, days) => {
      expect(daysInMonth(year, month)).toBe(days);
    });
  });

  describe("buildFilePlan", () => {
    it("builds one target per day of February 2022", () => {
      const plan = buildFilePlan({ year: "2022", months: ["02"], dataDir, baseUrl: BASE_URL });

      expect(plan).toHaveLength(28);
      expect(plan.map((t) => t.day)).toEqual(
        Array.from({ length: 28 }, (_, i) => String(i + 1).padStart(2, "0"))
      );
    });

    it("includes 29 February in leap years", () => {
      const plan = buildFilePlan({ year: "2020", months: ["02"], dataDir, baseUrl: BASE_URL });

      expect(plan).toHaveLength(29);
      expect(plan[28].relativePath).toBe(
        "v1.0/30min/8km/2020/02/CMORPH_V1.0_ADJ_8km-30min_2020022900.nc"
      );
    });

    it("covers the whole year when no months are given", () => {
      const plan = buildFilePlan({ year: "2023", dataDir, baseUrl: BASE_URL });

      expect(plan).toHaveLength(365);
      expect(plan[0].month).toBe("01");
      expect(plan[364].month).toBe("12");
    });

    it("builds the archive URL with the cmorph_ prefix in front of the dataset path", () => {
      const [first] = buildFilePlan({ year: "2022", months: ["02"], dataDir, baseUrl: BASE_URL });

      expect(first.remoteUrl).toBe(
        "https://rda.ucar.edu/data/ds502.2/cmorph_v1.0/30min/8km/2022/02/CMORPH_V1.0_ADJ_8km-30min_2022020100.nc"
      );
      expect(first.localPath).toBe(
        `${dataDir}/v1.0/30min/8km/2022/02/CMORPH_V1.0_ADJ_8km-30min_2022020100.nc`
      );
    });

    it("keeps local and remote paths identical apart from the cmorph_ segment", () => {
      const plan = buildFilePlan({ year: "2021", months: ["06", "07"], dataDir, baseUrl: BASE_URL });

      for (const target of plan) {
        const remoteTail = target.remoteUrl.slice(BASE_URL.length);
        const localTail = target.localPath.slice(dataDir.length + 1);
        expect(remoteTail).toBe(`cmorph_${localTail}`);
      }
    });

    it("creates the month directories", () => {
      buildFilePlan({ year: "2022", months: ["02", "03"], dataDir, baseUrl: BASE_URL });

      expect(existsSync(join(dataDir, "v1.0/30min/8km/2022/02"))).toBe(true);
      expect(existsSync(join(dataDir, "v1.0/30min/8km/2022/03"))).toBe(true);
      expect(existsSync(join(dataDir, "v1.0/30min/8km/2022/04"))).toBe(false);
    });

    it("returns frozen targets in month order", () => {
      const plan = buildFilePlan({ year: "2022", months: ["03", "01"], dataDir, baseUrl: BASE_URL });

      expect(Object.isFrozen(plan[0])).toBe(true);
      expect(plan[0].month).toBe("03");
      expect(plan[31].month).toBe("01");
    });
  });

  describe("normalizeMonths", () => {
    it("defaults to every month", () => {
      expect(normalizeMonths()).toEqual(ALL_MONTHS);
      expect(normalizeMonths([])).toHaveLength(12);
    });

    it("pads single digits and drops repeats", () => {
      expect(normalizeMonths(["2", "02", "11"])).toEqual(["02", "11"]);
    });

    it.each(["0", "13", "feb", "1.5", "012"])("rejects %s", (token) => {
      expect(() => normalizeMonths([token])).toThrow(`Invalid --month: "${token}" is not a month`);
    });
  });

  describe("validateYear", () => {
    it("accepts four digits", () => {
      expect(validateYear("2022")).toBe("2022");
    });

    it("rejects anything else", () => {
      expect(() => validateYear("22")).toThrow('Invalid --year: "22" is not a four-digit year');
    });
  });
});
