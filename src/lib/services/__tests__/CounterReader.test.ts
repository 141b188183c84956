import { describe, expect, it, vi } from "vitest";

import { MockPacketFilterAdapter } from "@/lib/adapters/mockPacketFilter";
import { createSilentLogger } from "@/lib/logger";
import { CounterReader } from "@/lib/services/CounterReader";

describe("CounterReader", () => {
  function listingWithNoise() {
    const packetFilter = new MockPacketFilterAdapter({ withChain: true });
    const out = packetFilter.insertRule("tm:10.0.0.5:out", { bytes: 3400, packets: 12 });
    packetFilter.insertRule("guest isolation", { bytes: 1, packets: 1 });
    packetFilter.insertRule(undefined, { bytes: 1, packets: 1 });
    const broken = packetFilter.insertRule("tm:10.0.0.5:in");
    packetFilter.insertRule("tm:10.0.0.5", { bytes: 5, packets: 1 });
    const other = packetFilter.insertRule("tm:10.0.0.6:in", { bytes: 700, packets: 7 });
    return { packetFilter, out, broken, other };
  }

  it("lists owned rules in listing order, with or without counters", async () => {
    const { packetFilter, out, broken, other } = listingWithNoise();
    const reader = new CounterReader(packetFilter, createSilentLogger());

    const owned = await reader.listOwned();

    expect(owned.map((rule) => [rule.handle, rule.tag])).toEqual([
      [out, "tm:10.0.0.5:out"],
      [broken, "tm:10.0.0.5:in"],
      [other, "tm:10.0.0.6:in"],
    ]);
  });

  it("drops owned rules with unparsable counters and warns about them", async () => {
    const { packetFilter, out, broken, other } = listingWithNoise();
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, "warn");
    const reader = new CounterReader(packetFilter, logger);

    const counters = await reader.readCounters();

    expect(counters).toEqual([
      { handle: out, tag: "tm:10.0.0.5:out", address: "10.0.0.5", direction: "out", bytes: 3400, packets: 12 },
      { handle: other, tag: "tm:10.0.0.6:in", address: "10.0.0.6", direction: "in", bytes: 700, packets: 7 },
    ]);
    expect(warn).toHaveBeenCalledWith({ handle: broken, tag: "tm:10.0.0.5:in" }, "Dropping rule with unparsable counter");
  });
});
