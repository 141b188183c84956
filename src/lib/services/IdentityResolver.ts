import { LEASE_HOSTNAME_PLACEHOLDER } from "@/lib/domain/constants";
import type { DeviceAddress, DeviceIdentity, LeaseEntry, LeaseIndex } from "@/lib/domain/models";
import { describeError } from "@/lib/domain/errors";
import type { Logger } from "@/lib/logger";
import type { LeaseTablePort } from "@/lib/ports/LeaseTablePort";
import type { NeighborCachePort } from "@/lib/ports/NeighborCachePort";
import { normalizeMac } from "@/lib/utils/network";

function displayName(address: DeviceAddress, lease: LeaseEntry | undefined): string {
  const hostname = lease?.hostname.trim();
  if (!hostname || hostname === LEASE_HOSTNAME_PLACEHOLDER) {
    return address;
  }
  return hostname;
}

export class IdentityResolver {
  constructor(
    private readonly leaseTable: LeaseTablePort,
    private readonly neighbors: NeighborCachePort,
    private readonly logger: Logger,
  ) {}

  /**
   * Snapshot of the lease table for one cycle. An unreadable table yields an
   * empty index so that the neighbor cache can still resolve addresses.
   */
  async loadLeases(): Promise<LeaseIndex> {
    try {
      const leases = await this.leaseTable.readLeases();
      const index = new Map<DeviceAddress, LeaseEntry>();
      for (const lease of leases) {
        if (!index.has(lease.address)) {
          index.set(lease.address, lease);
        }
      }
      return index;
    } catch (error) {
      this.logger.warn({ err: describeError(error) }, "Lease table unavailable, using neighbor cache only");
      return new Map();
    }
  }

  async resolve(address: DeviceAddress, leases: LeaseIndex): Promise<DeviceIdentity | null> {
    const lease = leases.get(address);
    // A leased address never falls back to the neighbor cache.
    const mac = lease ? normalizeMac(lease.mac) : await this.lookupNeighbor(address);
    if (!mac) {
      return null;
    }
    return { mac, name: displayName(address, lease) };
  }

  private async lookupNeighbor(address: DeviceAddress): Promise<string | null> {
    try {
      return normalizeMac(await this.neighbors.lookupMac(address));
    } catch (error) {
      this.logger.debug({ address, err: describeError(error) }, "Neighbor lookup failed");
      return null;
    }
  }
}
