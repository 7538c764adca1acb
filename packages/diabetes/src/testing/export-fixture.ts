/**
 * Small Glooko export archive for tests of code that consumes uploads
 */

import { deflateRawSync } from "zlib";

const METADATA = "Name:Test Patient, Date Range:2024-01-15 - 2024-01-15";

export const EXPORT_FILES: Record<string, string> = {
  "cgm_data_1.csv": [
    METADATA,
    "Timestamp,CGM Glucose Value (mg/dl),Serial Number",
    "2024-01-15 03:00,60,SN-1",
    "2024-01-15 03:05,200,SN-1",
  ].join("\n"),
  "Insulin data/bolus_data_1.csv": [
    METADATA,
    "Timestamp,Insulin Type,Blood Glucose Input (mg/dl),Carbs Input (g),Carbs Ratio,Insulin Delivered (U),Initial Delivery (U),Extended Delivery (U),Serial Number",
    "2024-01-15 12:00,Normal,0,50,10,5,5,0,SN-1",
  ].join("\n"),
  "Insulin data/basal_data_1.csv": [
    METADATA,
    "Timestamp,Basal Type,Duration (minutes),Percentage (%),Rate,Insulin Delivered (U),Serial Number",
    "2024-01-15 00:00,Scheduled,60,,0.8,0.8,SN-1",
  ].join("\n"),
};

export interface ZipFixtureEntry {
  name: string;
  content?: string;
  /** 0 = stored, 8 = deflate; anything else is written raw */
  method?: number;
  /** Zero sizes in the local header and append a data descriptor */
  dataDescriptor?: boolean;
  /** Uncompressed size recorded in the headers, when it should not match the content */
  declaredSize?: number;
}

/**
 * Write entries into a minimal ZIP (local headers, central directory, EOCD)
 */
export function buildZipEntries(entries: ZipFixtureEntry[]): Buffer {
  const locals: Buffer[] = [];
  const centrals: Buffer[] = [];
  let offset = 0;

  for (const entry of entries) {
    const name = Buffer.from(entry.name, "utf-8");
    const raw = Buffer.from(entry.content ?? "", "utf-8");
    const method = entry.method ?? 8;
    const data = method === 8 ? deflateRawSync(raw) : raw;
    const flags = entry.dataDescriptor ? 0x0008 : 0;
    const uncompressedSize = entry.declaredSize ?? raw.length;

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt16LE(flags, 6);
    local.writeUInt16LE(method, 8);
    local.writeUInt32LE(entry.dataDescriptor ? 0 : data.length, 18);
    local.writeUInt32LE(entry.dataDescriptor ? 0 : uncompressedSize, 22);
    local.writeUInt16LE(name.length, 26);

    const parts = [local, name, data];
    if (entry.dataDescriptor) {
      const descriptor = Buffer.alloc(16);
      descriptor.writeUInt32LE(0x08074b50, 0);
      descriptor.writeUInt32LE(data.length, 8);
      descriptor.writeUInt32LE(uncompressedSize, 12);
      parts.push(descriptor);
    }
    const localRecord = Buffer.concat(parts);

    const central = Buffer.alloc(46);
    central.writeUInt32LE(0x02014b50, 0);
    central.writeUInt16LE(20, 4);
    central.writeUInt16LE(20, 6);
    central.writeUInt16LE(flags, 8);
    central.writeUInt16LE(method, 10);
    central.writeUInt32LE(data.length, 20);
    central.writeUInt32LE(uncompressedSize, 24);
    central.writeUInt16LE(name.length, 28);
    central.writeUInt32LE(offset, 42);

    locals.push(localRecord);
    centrals.push(Buffer.concat([central, name]));
    offset += localRecord.length;
  }

  const centralDirectory = Buffer.concat(centrals);
  const eocd = Buffer.alloc(22);
  eocd.writeUInt32LE(0x06054b50, 0);
  eocd.writeUInt16LE(centrals.length, 8);
  eocd.writeUInt16LE(centrals.length, 10);
  eocd.writeUInt32LE(centralDirectory.length, 12);
  eocd.writeUInt32LE(offset, 16);

  return Buffer.concat([...locals, centralDirectory, eocd]);
}

/** Deflate every file into a minimal ZIP */
export function buildZip(files: Record<string, string>): Buffer {
  return buildZipEntries(
    Object.entries(files).map(([name, content]) => ({ name, content }))
  );
}

export function exportArchiveBase64(files: Record<string, string> = EXPORT_FILES): string {
  return buildZip(files).toString("base64");
}
