import { describe, expect, it, vi } from "vitest";

import { NftPacketFilterAdapter } from "@/lib/adapters/nftPacketFilter";
import { CommandError, type CommandResult, type CommandRunner } from "@/lib/api/command";
import { PacketFilterError } from "@/lib/domain/errors";

const target = { family: "inet", table: "traffic_monitor", chain: "forward" };

function runner(handler: (args: readonly string[]) => CommandResult | Error) {
  return vi.fn<CommandRunner>((_file, args) => {
    const result = handler(args);
    return result instanceof Error ? Promise.reject(result) : Promise.resolve(result);
  });
}

function ok(stdout = ""): CommandResult {
  return { stdout, stderr: "" };
}

function commandLines(run: ReturnType<typeof runner>): string[] {
  return run.mock.calls.map(([file, args]) => [file, ...args].join(" "));
}

const listing = {
  nftables: [
    { metainfo: { version: "1.0.9", release_name: "Old Doc Yak #3", json_schema_version: 1 } },
    {
      chain: {
        family: "inet",
        table: "traffic_monitor",
        name: "forward",
        handle: 1,
        type: "filter",
        hook: "forward",
        prio: 0,
        policy: "accept",
      },
    },
    {
      rule: {
        family: "inet",
        table: "traffic_monitor",
        chain: "forward",
        handle: 4,
        comment: "tm:10.0.0.5:out",
        expr: [
          { match: { op: "==", left: { payload: { protocol: "ip", field: "saddr" } }, right: "10.0.0.5" } },
          { counter: { packets: 12, bytes: 3400 } },
        ],
      },
    },
    {
      rule: {
        family: "inet",
        table: "traffic_monitor",
        chain: "forward",
        handle: 5,
        comment: "guest isolation",
        expr: [{ counter: { packets: 1, bytes: 2 } }, { accept: null }],
      },
    },
    {
      rule: {
        family: "inet",
        table: "traffic_monitor",
        chain: "forward",
        handle: 6,
        comment: "tm:10.0.0.5:in",
        expr: [{ counter: { packets: -1, bytes: 10 } }],
      },
    },
    {
      rule: {
        family: "inet",
        table: "traffic_monitor",
        chain: "forward",
        handle: "seven",
        comment: "tm:10.0.0.6:in",
        expr: [{ counter: { packets: 1, bytes: 10 } }],
      },
    },
    {
      rule: { family: "inet", table: "traffic_monitor", chain: "forward", handle: 8 },
    },
  ],
};

describe("NftPacketFilterAdapter", () => {
  it("decodes a JSON chain listing into rules in listing order", async () => {
    const run = runner(() => ok(JSON.stringify(listing)));
    const adapter = new NftPacketFilterAdapter(target, run);

    const rules = await adapter.listRules();

    expect(commandLines(run)).toEqual(["nft -j list chain inet traffic_monitor forward"]);
    expect(rules).toEqual([
      { handle: 4, comment: "tm:10.0.0.5:out", counter: { bytes: 3400, packets: 12 } },
      { handle: 5, comment: "guest isolation", counter: { bytes: 2, packets: 1 } },
      { handle: 6, comment: "tm:10.0.0.5:in", counter: undefined },
      { handle: 8, comment: undefined, counter: undefined },
    ]);
  });

  it("rejects a listing that is not JSON", async () => {
    const adapter = new NftPacketFilterAdapter(target, runner(() => ok("table inet traffic_monitor {")));

    await expect(adapter.listRules()).rejects.toThrow(
      "nft -j list chain inet traffic_monitor forward printed invalid JSON",
    );
  });

  it("creates the table and chain only when they are missing", async () => {
    const run = runner((args) => {
      if (args[0] === "list" && args[1] === "table") {
        return new CommandError("Command failed", "Error: No such file or directory", 1);
      }
      return ok();
    });
    const adapter = new NftPacketFilterAdapter(target, run);

    await adapter.ensureTable();
    await adapter.ensureChain();

    expect(commandLines(run)).toEqual([
      "nft list table inet traffic_monitor",
      "nft add table inet traffic_monitor",
      "nft list chain inet traffic_monitor forward",
    ]);
  });

  it("adds the forward hook chain with an accept policy", async () => {
    const run = runner((args) =>
      args[0] === "list" ? new CommandError("Command failed", "Error: No such file or directory", 1) : ok(),
    );
    const adapter = new NftPacketFilterAdapter(target, run);

    await adapter.ensureChain();

    expect(run.mock.calls[1]?.[1]).toEqual([
      "add",
      "chain",
      "inet",
      "traffic_monitor",
      "forward",
      "{ type filter hook forward priority 0; policy accept; }",
    ]);
  });

  it("matches the source address for outbound and the destination for inbound rules", async () => {
    const run = runner(() => ok());
    const adapter = new NftPacketFilterAdapter(target, run);

    await adapter.addCounterRule({ address: "10.0.0.5", direction: "out", tag: "tm:10.0.0.5:out" });
    await adapter.addCounterRule({ address: "10.0.0.5", direction: "in", tag: "tm:10.0.0.5:in" });

    expect(run.mock.calls.map(([, args]) => args)).toEqual([
      ["add", "rule", "inet", "traffic_monitor", "forward", "ip", "saddr", "10.0.0.5", "counter", "comment", '"tm:10.0.0.5:out"'],
      ["add", "rule", "inet", "traffic_monitor", "forward", "ip", "daddr", "10.0.0.5", "counter", "comment", '"tm:10.0.0.5:in"'],
    ]);
  });

  it("wraps command failures in PacketFilterError", async () => {
    const run = runner(
      () => new CommandError("Command failed", "Error: Could not process rule: No such file or directory", 1),
    );
    const adapter = new NftPacketFilterAdapter(target, run);

    const failure = adapter.deleteRule(9);

    await expect(failure).rejects.toBeInstanceOf(PacketFilterError);
    await expect(failure).rejects.toThrow(
      "nft delete rule inet traffic_monitor forward handle 9 failed: Error: Could not process rule: No such file or directory",
    );
  });

  it("reports a missing chain through hasChain", async () => {
    const adapter = new NftPacketFilterAdapter(
      target,
      runner(() => new CommandError("Command failed", "Error: No such file or directory", 1)),
    );

    await expect(adapter.hasChain()).resolves.toBe(false);
  });
});
