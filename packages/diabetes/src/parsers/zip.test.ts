import { describe, it, expect, vi } from "vitest";
import { extractCsvFilesFromZip } from "./zip.js";
import { ZipFormatError } from "../errors.js";
import { buildZipEntries } from "../testing/export-fixture.js";

// =============================================================================
// Tests
// =============================================================================

describe("extractCsvFilesFromZip", () => {
  it("extracts deflated and stored CSVs keeping their archive paths", () => {
    const zip = buildZipEntries([
      { name: "cgm_data_1.csv", content: "a,b\n1,2" },
      { name: "Insulin data/bolus_data_1.csv", content: "c,d\n3,4", method: 0 },
    ]);

    expect(extractCsvFilesFromZip(zip)).toEqual([
      { fileName: "cgm_data_1.csv", content: "a,b\n1,2" },
      { fileName: "Insulin data/bolus_data_1.csv", content: "c,d\n3,4" },
    ]);
  });

  it("skips directories, non-CSV files and __MACOSX twins", () => {
    const zip = buildZipEntries([
      { name: "Insulin data/", method: 0 },
      { name: "readme.txt", content: "hello" },
      { name: "__MACOSX/._cgm_data_1.csv", content: "junk" },
      { name: "ALARMS_DATA_1.CSV", content: "x\n1" },
    ]);

    const files = extractCsvFilesFromZip(zip);

    expect(files.map((f) => f.fileName)).toEqual(["ALARMS_DATA_1.CSV"]);
  });

  it("reads sizes from the central directory when a data descriptor is used", () => {
    const zip = buildZipEntries([
      { name: "basal_data_1.csv", content: "rate\n0.8\n0.9", dataDescriptor: true },
    ]);

    expect(extractCsvFilesFromZip(zip)).toEqual([
      { fileName: "basal_data_1.csv", content: "rate\n0.8\n0.9" },
    ]);
  });

  it("strips a leading UTF-8 BOM", () => {
    const zip = buildZipEntries([{ name: "cgm_data_1.csv", content: "\uFEFFTimestamp\n1" }]);

    expect(extractCsvFilesFromZip(zip)[0].content).toBe("Timestamp\n1");
  });

  it("skips entries with an unsupported compression method", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const zip = buildZipEntries([
      { name: "cgm_data_1.csv", content: "raw", method: 12 },
      { name: "bg_data_1.csv", content: "ok" },
    ]);

    const files = extractCsvFilesFromZip(zip);

    expect(files.map((f) => f.fileName)).toEqual(["bg_data_1.csv"]);
    expect(warn).toHaveBeenCalledWith(
      "Unsupported compression method 12 for cgm_data_1.csv, skipping"
    );
    warn.mockRestore();
  });

  it("rejects buffers that are not ZIP archives", () => {
    expect(() => extractCsvFilesFromZip(Buffer.from("definitely not an archive file"))).toThrow(
      ZipFormatError
    );
    expect(() => extractCsvFilesFromZip(Buffer.from("short"))).toThrow("Not a ZIP archive");
  });

  it("rejects archives that expand past the size cap", () => {
    const zip = buildZipEntries([{ name: "cgm_data_1.csv", content: "0123456789abcdef" }]);

    expect(() => extractCsvFilesFromZip(zip, { maxUncompressedBytes: 10 })).toThrow(
      "Archive expands beyond 10 bytes"
    );
  });

  it("counts inflated bytes when the headers understate them", () => {
    const zip = buildZipEntries([
      { name: "cgm_data_1.csv", content: "aaaaaaaa", declaredSize: 0 },
      { name: "cgm_data_2.csv", content: "bbbbbbbb", declaredSize: 0 },
      { name: "cgm_data_3.csv", content: "cccccccc", declaredSize: 0 },
    ]);

    const extract = () => extractCsvFilesFromZip(zip, { maxUncompressedBytes: 10 });
    expect(extract).toThrow(ZipFormatError);
    expect(extract).toThrow("Archive expands beyond 10 bytes");
  });

  it("counts stored bytes when the headers understate them", () => {
    const zip = buildZipEntries([
      { name: "cgm_data_1.csv", content: "aaaaaaaa", method: 0, declaredSize: 0 },
      { name: "cgm_data_2.csv", content: "bbbbbbbb", method: 0, declaredSize: 0 },
    ]);

    expect(() => extractCsvFilesFromZip(zip, { maxUncompressedBytes: 10 })).toThrow(
      "Archive expands beyond 10 bytes"
    );
  });

  it("extracts understated entries that still fit the cap", () => {
    const zip = buildZipEntries([
      { name: "cgm_data_1.csv", content: "aaaa", declaredSize: 0 },
      { name: "cgm_data_2.csv", content: "bbbbb", declaredSize: 0 },
    ]);

    expect(extractCsvFilesFromZip(zip, { maxUncompressedBytes: 10 })).toEqual([
      { fileName: "cgm_data_1.csv", content: "aaaa" },
      { fileName: "cgm_data_2.csv", content: "bbbbb" },
    ]);
  });

  it("rejects a truncated archive", () => {
    const zip = buildZipEntries([{ name: "cgm_data_1.csv", content: "a,b\n1,2", method: 0 }]);
    // Point the central directory past the end of the buffer
    zip.writeUInt32LE(zip.length + 100, zip.length - 6);

    expect(() => extractCsvFilesFromZip(zip)).toThrow("Corrupt ZIP central directory");
  });
});
