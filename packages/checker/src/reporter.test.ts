import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import { runAudit, summarize, writeReport } from "./reporter.js";
import { CheckEngine } from "./engine.js";
import {
  acceptMitOnly,
  baseEntry,
  sampleDatabases,
  sampleRepository,
} from "./test-fixtures.js";

vi.mock("node:fs");
vi.mock("node:fs/promises");

const OPTIONS = {
  validateLicense: acceptMitOnly,
  geometryBackends: ["freecad", "openscad"] as const,
  sidecarExtension: ".base",
};

describe("reporter", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(fs.readdirSync).mockImplementation((dir) => {
      if (String(dir) === "/repo/freecad/C1") {
        return ["a.py", "b.py"] as unknown as ReturnType<typeof fs.readdirSync>;
      }
      const err = new Error("ENOENT") as NodeJS.ErrnoException;
      err.code = "ENOENT";
      throw err;
    });
    vi.mocked(fsPromises.mkdir).mockResolvedValue(undefined);
    vi.mocked(fsPromises.writeFile).mockResolvedValue(undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("summarize", () => {
    it("should count violations per check", () => {
      const engine = new CheckEngine(
        sampleRepository(),
        sampleDatabases({ freecad: [baseEntry("a.py", ["A"])] }),
        OPTIONS,
      );

      const summary = summarize(engine);

      expect(summary.byCheck).toEqual({
        missingbase: 1,
        unknownclass: 0,
        missingcommonparameters: 1,
        missingdrawing: 2,
        missingsvgsource: 0,
        unsupportedlicense: 0,
        unknownfile: 1,
      });
      expect(summary.totalViolations).toBe(5);
      expect(summary.failed).toEqual([]);
      expect(summary.date).toBe(summary.scannedAt.split("T")[0]);
      expect(summary.report).toContain("b.py      /repo/freecad/C1  \n");
    });
  });

  describe("writeReport", () => {
    it("should create the parent directory and write the report", async () => {
      await writeReport("/out/audit/report.txt", "Stray files\n");

      expect(fsPromises.mkdir).toHaveBeenCalledWith("/out/audit", {
        recursive: true,
      });
      expect(fsPromises.writeFile).toHaveBeenCalledWith(
        "/out/audit/report.txt",
        "Stray files\n",
        "utf-8",
      );
    });
  });

  describe("runAudit", () => {
    it("should write the report when a path is given", async () => {
      const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

      const summary = await runAudit(sampleRepository(), sampleDatabases(), {
        ...OPTIONS,
        reportPath: "/out/report.txt",
      });

      expect(fsPromises.writeFile).toHaveBeenCalledWith(
        "/out/report.txt",
        summary.report,
        "utf-8",
      );
      expect(logSpy).toHaveBeenCalledWith(
        "[Checker] Auditing 1 collections against 3 backends...",
      );
      expect(logSpy).toHaveBeenCalledWith(
        "[Checker] Audit complete: 7 violations (0 failed checks)",
      );
      expect(logSpy).toHaveBeenCalledWith(
        "[Checker] Report written to /out/report.txt",
      );
    });

    it("should not write anything without a report path", async () => {
      vi.spyOn(console, "log").mockImplementation(() => {});

      const summary = await runAudit(
        sampleRepository(),
        sampleDatabases(),
        OPTIONS,
      );

      expect(summary.totalViolations).toBe(7);
      expect(fsPromises.writeFile).not.toHaveBeenCalled();
    });

    it("should propagate a failing check", async () => {
      vi.spyOn(console, "log").mockImplementation(() => {});

      await expect(
        runAudit(sampleRepository(), sampleDatabases({ drawings: null }), {
          ...OPTIONS,
          reportPath: "/out/report.txt",
        }),
      ).rejects.toThrow("Backend database 'drawings' is not available");
      expect(fsPromises.writeFile).not.toHaveBeenCalled();
    });
  });
});
