import { describe, expect, it, vi } from "vitest";

import { MockLeaseTableAdapter } from "@/lib/adapters/mockLeaseTable";
import { MockNeighborCacheAdapter } from "@/lib/adapters/mockNeighborCache";
import type { LeaseEntry } from "@/lib/domain/models";
import { createSilentLogger } from "@/lib/logger";
import type { NeighborCachePort } from "@/lib/ports/NeighborCachePort";
import { IdentityResolver } from "@/lib/services/IdentityResolver";

function lease(address: string, mac: string, hostname: string): LeaseEntry {
  return { expiresAt: 1792400000, mac, address, hostname };
}

async function resolveWith(
  leases: LeaseEntry[] | null,
  neighbors: NeighborCachePort,
  address: string,
) {
  const resolver = new IdentityResolver(new MockLeaseTableAdapter(leases), neighbors, createSilentLogger());
  return resolver.resolve(address, await resolver.loadLeases());
}

describe("IdentityResolver", () => {
  it("takes MAC and hostname from the lease table", async () => {
    const identity = await resolveWith(
      [lease("10.0.0.5", "AA:BB:CC:DD:EE:FF", "laptop")],
      new MockNeighborCacheAdapter({ "10.0.0.5": "00:00:00:00:00:01" }),
      "10.0.0.5",
    );

    expect(identity).toEqual({ mac: "aa:bb:cc:dd:ee:ff", name: "laptop" });
  });

  it("names a device after its address when the lease hostname is a placeholder", async () => {
    const identity = await resolveWith(
      [lease("10.0.0.6", "11:22:33:44:55:66", "*")],
      new MockNeighborCacheAdapter(),
      "10.0.0.6",
    );

    expect(identity).toEqual({ mac: "11:22:33:44:55:66", name: "10.0.0.6" });
  });

  it("falls back to the neighbor cache for unleased addresses", async () => {
    const identity = await resolveWith(
      [],
      new MockNeighborCacheAdapter({ "10.0.0.8": "AA:BB:CC:00:11:22" }),
      "10.0.0.8",
    );

    expect(identity).toEqual({ mac: "aa:bb:cc:00:11:22", name: "10.0.0.8" });
  });

  it("leaves a leased address unresolved when its lease MAC is not canonical", async () => {
    const lookupMac = vi.fn<NeighborCachePort["lookupMac"]>().mockResolvedValue("02:00:00:00:00:09");

    const identity = await resolveWith([lease("10.0.0.9", "*", "tv")], { lookupMac }, "10.0.0.9");

    expect(identity).toBeNull();
    expect(lookupMac).not.toHaveBeenCalled();
  });

  it("returns null when neither source has a valid MAC", async () => {
    await expect(resolveWith([], new MockNeighborCacheAdapter(), "10.0.0.7")).resolves.toBeNull();
    await expect(
      resolveWith([], new MockNeighborCacheAdapter({ "10.0.0.7": "00:11:22" }), "10.0.0.7"),
    ).resolves.toBeNull();
  });

  it("treats a failing neighbor lookup as no MAC", async () => {
    const neighbors: NeighborCachePort = {
      lookupMac: vi.fn<NeighborCachePort["lookupMac"]>().mockRejectedValue(new Error("ip: not found")),
    };

    await expect(resolveWith([], neighbors, "10.0.0.7")).resolves.toBeNull();
  });

  it("still resolves through the neighbor cache when the lease table is unreadable", async () => {
    const identity = await resolveWith(
      null,
      new MockNeighborCacheAdapter({ "10.0.0.5": "aa:bb:cc:dd:ee:ff" }),
      "10.0.0.5",
    );

    expect(identity).toEqual({ mac: "aa:bb:cc:dd:ee:ff", name: "10.0.0.5" });
  });

  it("indexes the first lease of an address", async () => {
    const resolver = new IdentityResolver(
      new MockLeaseTableAdapter([
        lease("10.0.0.5", "aa:bb:cc:dd:ee:ff", "laptop"),
        lease("10.0.0.5", "11:22:33:44:55:66", "phone"),
      ]),
      new MockNeighborCacheAdapter(),
      createSilentLogger(),
    );

    const leases = await resolver.loadLeases();

    expect(leases.size).toBe(1);
    expect(leases.get("10.0.0.5")?.hostname).toBe("laptop");
  });
});
