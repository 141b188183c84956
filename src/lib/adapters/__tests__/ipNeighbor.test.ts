import { describe, expect, it, vi } from "vitest";

import { IpNeighborAdapter } from "@/lib/adapters/ipNeighbor";
import type { CommandRunner } from "@/lib/api/command";

function adapterPrinting(stdout: string) {
  const run = vi.fn<CommandRunner>().mockResolvedValue({ stdout, stderr: "" });
  return { run, adapter: new IpNeighborAdapter(run) };
}

describe("IpNeighborAdapter", () => {
  it("returns the link-layer address of the queried neighbor", async () => {
    const { run, adapter } = adapterPrinting(
      JSON.stringify([{ dst: "10.0.0.9", dev: "br-lan", lladdr: "AA:BB:CC:00:11:22", state: ["STALE"] }]),
    );

    await expect(adapter.lookupMac("10.0.0.9")).resolves.toBe("AA:BB:CC:00:11:22");
    expect(run).toHaveBeenCalledWith("ip", ["-j", "neigh", "show", "10.0.0.9"]);
  });

  it("returns null for an unresolved neighbor entry", async () => {
    const { adapter } = adapterPrinting(JSON.stringify([{ dst: "10.0.0.9", dev: "br-lan", state: ["FAILED"] }]));

    await expect(adapter.lookupMac("10.0.0.9")).resolves.toBeNull();
  });

  it("returns null when the cache has no entry", async () => {
    const { adapter } = adapterPrinting("");

    await expect(adapter.lookupMac("10.0.0.9")).resolves.toBeNull();
  });
});
