import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { BaselineKey, BaselineRecord } from "@/lib/domain/models";
import type { BaselineStorePort } from "@/lib/ports/BaselineStorePort";
import { macToId } from "@/lib/utils/network";

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function parseCount(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) {
    return null;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

function parseKey(value: string | undefined): string | null {
  return value ? value : null;
}

export function parseBaselineRecord(contents: string): BaselineRecord {
  const fields = new Map<string, string>();
  for (const line of contents.split("\n")) {
    const separator = line.indexOf("=");
    if (separator > 0) {
      fields.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
    }
  }

  const dayBytes = parseCount(fields.get("day_bytes"));
  const dayKey = parseKey(fields.get("day_date"));
  const weekBytes = parseCount(fields.get("week_bytes"));
  const weekKey = parseKey(fields.get("week_num"));

  // A period baseline is only usable as a (bytes, key) pair.
  return {
    lastBytes: parseCount(fields.get("bw_bytes")) ?? 0,
    lastSampleTime: parseCount(fields.get("bw_ts")) ?? 0,
    dayBytes: dayBytes !== null && dayKey !== null ? dayBytes : null,
    dayKey: dayBytes !== null && dayKey !== null ? dayKey : null,
    weekBytes: weekBytes !== null && weekKey !== null ? weekBytes : null,
    weekKey: weekBytes !== null && weekKey !== null ? weekKey : null,
  };
}

export function serializeBaselineRecord(record: BaselineRecord): string {
  const lines = [
    `bw_bytes=${record.lastBytes}`,
    `bw_ts=${record.lastSampleTime}`,
    `day_bytes=${record.dayBytes ?? ""}`,
    `day_date=${record.dayKey ?? ""}`,
    `week_bytes=${record.weekBytes ?? ""}`,
    `week_num=${record.weekKey ?? ""}`,
  ];
  return `${lines.join("\n")}\n`;
}

/**
 * One small file per (MAC, direction) under a directory that is expected to
 * live on tmpfs, so records disappear together with the kernel counters.
 */
export class FileBaselineStore implements BaselineStorePort {
  constructor(private readonly directory: string) {}

  pathFor({ mac, direction }: BaselineKey): string {
    return join(this.directory, `${macToId(mac)}_${direction}`);
  }

  async load(key: BaselineKey): Promise<BaselineRecord | null> {
    try {
      const contents = await readFile(this.pathFor(key), "utf8");
      return parseBaselineRecord(contents);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async save(key: BaselineKey, record: BaselineRecord): Promise<void> {
    const path = this.pathFor(key);
    const temporary = `${path}.${process.pid}.tmp`;
    await mkdir(this.directory, { recursive: true });
    await writeFile(temporary, serializeBaselineRecord(record), "utf8");
    await rename(temporary, path);
  }
}
