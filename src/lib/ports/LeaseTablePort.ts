import type { LeaseEntry } from "@/lib/domain/models";

export interface LeaseTablePort {
  /** Rejects with LeaseTableUnavailableError when the table cannot be read. */
  readLeases(): Promise<LeaseEntry[]>;
}
