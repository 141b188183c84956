import type { DeviceAddress } from "@/lib/domain/models";

export interface NeighborCachePort {
  lookupMac(address: DeviceAddress): Promise<string | null>;
}
