import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { SYSTEM_MESSAGE, createDefaultSchedule } from "@pump-advisor/diabetes";
import { buildZip, EXPORT_FILES } from "@pump-advisor/diabetes/testing";
import { CliError, formatDefaults, loadSettings, parseUnits, runAnalyze } from "./analyze";

describe("parseUnits", () => {
  it("accepts the two units", () => {
    expect(parseUnits("mg/dL")).toBe("mg/dL");
    expect(parseUnits(undefined)).toBeUndefined();
  });

  it("rejects anything else", () => {
    expect(() => parseUnits("mgdl")).toThrow('Unknown units "mgdl" (expected mmol/L or mg/dL)');
  });
});

describe("formatDefaults", () => {
  it("prints the default schedule as JSON", () => {
    expect(JSON.parse(formatDefaults("mg/dL"))).toEqual(createDefaultSchedule("mg/dL"));
    expect(formatDefaults(undefined).split("\n")[1]).toBe('  "units": "mmol/L",');
  });
});

describe("with files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "pump-advisor-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string | Buffer): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  describe("loadSettings", () => {
    it("falls back to the default schedule", () => {
      expect(loadSettings(undefined, "mg/dL")).toEqual(createDefaultSchedule("mg/dL"));
    });

    it("reads and validates a settings file", () => {
      const schedule = createDefaultSchedule("mg/dL");
      schedule.timedSettings[3].basalRate = 0.65;
      const path = writeFile("settings.json", JSON.stringify(schedule));

      expect(loadSettings(path, undefined).timedSettings[3].basalRate).toBe(0.65);
    });

    it("lets --units override the file", () => {
      const path = writeFile(
        "settings.json",
        JSON.stringify({ units: "mg/dL", timedSettings: Array.from({ length: 24 }, () => ({})) })
      );

      const settings = loadSettings(path, "mmol/L");
      expect(settings.units).toBe("mmol/L");
      expect(settings.timedSettings[0].targetBg).toBe(5.6);
    });

    it("reports validation errors", () => {
      const path = writeFile("settings.json", JSON.stringify({ units: "mg/dL", timedSettings: [] }));

      expect(() => loadSettings(path, undefined)).toThrow(
        `Invalid settings in ${path}:\n  Expected 24 timed settings`
      );
    });

    it("reports unreadable files", () => {
      const path = writeFile("settings.json", "{");

      expect(() => loadSettings(path, undefined)).toThrow(CliError);
    });
  });

  describe("runAnalyze", () => {
    it("prints the prompt on a dry run without a model", async () => {
      const zip = writeFile("export.zip", buildZip(EXPORT_FILES));
      const createClient = vi.fn();

      const output = await runAnalyze(zip, { dryRun: true, units: "mg/dL" }, {}, createClient);

      expect(output.startsWith(`=== System ===\n${SYSTEM_MESSAGE}\n\n=== User ===\n`)).toBe(true);
      expect(output).toContain("CGM Data:");
      expect(createClient).not.toHaveBeenCalled();
    });

    it("returns the cleaned recommendation", async () => {
      const zip = writeFile("export.zip", buildZip(EXPORT_FILES));
      const complete = vi.fn().mockResolvedValue("\n### Recommended Change\n- Lower 03:00 basal\n```");

      const output = await runAnalyze(zip, {}, {}, () => ({ model: "test-model", complete }));

      expect(output).toBe("### Recommended Change\n- Lower 03:00 basal");
      expect(complete).toHaveBeenCalledTimes(1);
    });

    it("fails on missing tables", async () => {
      const zip = writeFile(
        "export.zip",
        buildZip({ "cgm_data_1.csv": EXPORT_FILES["cgm_data_1.csv"] })
      );

      await expect(runAnalyze(zip, { dryRun: true }, {})).rejects.toThrow(
        "Missing required data: bolus data (Insulin data/bolus_data_1.csv), basal data (Insulin data/basal_data_1.csv)"
      );
    });

    it("fails on an unknown timezone", async () => {
      const zip = writeFile("export.zip", buildZip(EXPORT_FILES));

      await expect(runAnalyze(zip, { dryRun: true, timezone: "Nowhere/Land" }, {})).rejects.toThrow(
        'Unknown timezone "Nowhere/Land"'
      );
    });

    it("fails on a missing archive", async () => {
      await expect(runAnalyze(join(dir, "missing.zip"), { dryRun: true }, {})).rejects.toThrow(
        `Could not read ${join(dir, "missing.zip")}`
      );
    });
  });
});
