import type { BaselineRecord } from "@/lib/domain/models";
import { dayKey, toEpochSeconds, weekKey } from "@/lib/utils/date";

export interface BaselineUpdate {
  record: BaselineRecord;
  daily: number;
  weekly: number;
}

interface PeriodBaseline {
  bytes: number | null;
  key: string | null;
}

/** Bytes per second between two cumulative readings, floored, never negative. */
export function computeBandwidth(
  previousBytes: number | undefined,
  currentBytes: number,
  intervalSeconds: number,
): number {
  const delta = Math.max(0, currentBytes - (previousBytes ?? 0));
  return Math.floor(delta / intervalSeconds);
}

function advancePeriod(
  baseline: PeriodBaseline,
  bytesNow: number,
  currentKey: string,
): { bytes: number; key: string } {
  // The kernel counter went backwards (rule recreated or router rebooted).
  const counterReset = baseline.bytes !== null && bytesNow < baseline.bytes;
  if (counterReset || baseline.bytes === null || baseline.key !== currentKey) {
    return { bytes: bytesNow, key: currentKey };
  }
  return { bytes: baseline.bytes, key: currentKey };
}

/**
 * Moves a baseline record forward to `bytesNow` observed at `sampledAt`.
 *
 * The counters are cumulative and never reset at midnight, so daily and weekly
 * usage are offsets from the counter value recorded when the period started.
 */
export function advanceBaseline(
  previous: BaselineRecord | null,
  bytesNow: number,
  sampledAt: Date,
): BaselineUpdate {
  const day = advancePeriod(
    { bytes: previous?.dayBytes ?? null, key: previous?.dayKey ?? null },
    bytesNow,
    dayKey(sampledAt),
  );
  const week = advancePeriod(
    { bytes: previous?.weekBytes ?? null, key: previous?.weekKey ?? null },
    bytesNow,
    weekKey(sampledAt),
  );

  return {
    record: {
      lastBytes: bytesNow,
      lastSampleTime: toEpochSeconds(sampledAt),
      dayBytes: day.bytes,
      dayKey: day.key,
      weekBytes: week.bytes,
      weekKey: week.key,
    },
    daily: bytesNow - day.bytes,
    weekly: bytesNow - week.bytes,
  };
}
