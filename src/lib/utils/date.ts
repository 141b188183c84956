import { format } from "date-fns";

// Baseline periods follow the local time zone of the process.

export function dayKey(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

export function weekKey(date: Date): string {
  return format(date, "RRRR-'W'II");
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
