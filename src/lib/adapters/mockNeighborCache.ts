import type { DeviceAddress } from "@/lib/domain/models";
import type { NeighborCachePort } from "@/lib/ports/NeighborCachePort";

export class MockNeighborCacheAdapter implements NeighborCachePort {
  private readonly entries: Map<DeviceAddress, string>;

  constructor(entries: Record<DeviceAddress, string> = {}) {
    this.entries = new Map(Object.entries(entries));
  }

  lookupMac(address: DeviceAddress): Promise<string | null> {
    return Promise.resolve(this.entries.get(address) ?? null);
  }
}
