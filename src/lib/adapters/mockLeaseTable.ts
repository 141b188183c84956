import { LeaseTableUnavailableError } from "@/lib/domain/errors";
import type { LeaseEntry } from "@/lib/domain/models";
import type { LeaseTablePort } from "@/lib/ports/LeaseTablePort";

export class MockLeaseTableAdapter implements LeaseTablePort {
  constructor(private leases: LeaseEntry[] | null = []) {}

  /** `null` makes the table unreadable. */
  setLeases(leases: LeaseEntry[] | null): void {
    this.leases = leases;
  }

  readLeases(): Promise<LeaseEntry[]> {
    if (this.leases === null) {
      return Promise.reject(new LeaseTableUnavailableError("mock://leases"));
    }
    return Promise.resolve(this.leases.map((lease) => ({ ...lease })));
  }
}
