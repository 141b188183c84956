import { CommandError, execFileRunner, type CommandRunner } from "@/lib/api/command";
import { isRecord } from "@/lib/api/transformers";
import type { IpNeighborEntry, NftListResponse } from "@/lib/api/types";
import { PacketFilterError } from "@/lib/domain/errors";

export interface NftTarget {
  family: string;
  table: string;
  chain: string;
}

export type AddressMatch = ["ip", "saddr" | "daddr", string];

const FORWARD_CHAIN_DEFINITION = "{ type filter hook forward priority 0; policy accept; }";

function isNftListResponse(value: unknown): value is NftListResponse {
  return isRecord(value) && Array.isArray(value.nftables);
}

function isNeighborList(value: unknown): value is IpNeighborEntry[] {
  return Array.isArray(value) && value.every((entry) => isRecord(entry) && typeof entry.dst === "string");
}

export class NftClient {
  constructor(
    private readonly target: NftTarget,
    private readonly run: CommandRunner = execFileRunner,
    private readonly binary: string = "nft",
  ) {}

  private async request(args: string[]): Promise<string> {
    try {
      const { stdout } = await this.run(this.binary, args);
      return stdout;
    } catch (error) {
      const stderr = error instanceof CommandError ? error.stderr : undefined;
      const detail = stderr || (error instanceof Error ? error.message : String(error));
      throw new PacketFilterError(
        `${this.binary} ${args.join(" ")} failed: ${detail}`,
        [this.binary, ...args],
        stderr,
      );
    }
  }

  private async succeeds(args: string[]): Promise<boolean> {
    try {
      await this.request(args);
      return true;
    } catch (error) {
      if (error instanceof PacketFilterError) {
        return false;
      }
      throw error;
    }
  }

  async tableExists(): Promise<boolean> {
    const { family, table } = this.target;
    return this.succeeds(["list", "table", family, table]);
  }

  async chainExists(): Promise<boolean> {
    const { family, table, chain } = this.target;
    return this.succeeds(["list", "chain", family, table, chain]);
  }

  async addTable(): Promise<void> {
    const { family, table } = this.target;
    await this.request(["add", "table", family, table]);
  }

  async addForwardChain(): Promise<void> {
    const { family, table, chain } = this.target;
    await this.request(["add", "chain", family, table, chain, FORWARD_CHAIN_DEFINITION]);
  }

  async listChain(): Promise<NftListResponse> {
    const { family, table, chain } = this.target;
    const args = ["-j", "list", "chain", family, table, chain];
    const stdout = await this.request(args);
    let payload: unknown;
    try {
      payload = JSON.parse(stdout);
    } catch {
      throw new PacketFilterError(`${this.binary} ${args.join(" ")} printed invalid JSON`, [
        this.binary,
        ...args,
      ]);
    }
    if (!isNftListResponse(payload)) {
      throw new PacketFilterError(`${this.binary} ${args.join(" ")} printed no nftables array`, [
        this.binary,
        ...args,
      ]);
    }
    return payload;
  }

  async addCounterRule(match: AddressMatch, comment: string): Promise<void> {
    const { family, table, chain } = this.target;
    await this.request([
      "add",
      "rule",
      family,
      table,
      chain,
      ...match,
      "counter",
      "comment",
      JSON.stringify(comment),
    ]);
  }

  async deleteRule(handle: number): Promise<void> {
    const { family, table, chain } = this.target;
    await this.request(["delete", "rule", family, table, chain, "handle", String(handle)]);
  }
}

export class IpNeighborClient {
  constructor(
    private readonly run: CommandRunner = execFileRunner,
    private readonly binary: string = "ip",
  ) {}

  async show(address: string): Promise<IpNeighborEntry[]> {
    const { stdout } = await this.run(this.binary, ["-j", "neigh", "show", address]);
    if (!stdout.trim()) {
      return [];
    }
    const payload: unknown = JSON.parse(stdout);
    if (!isNeighborList(payload)) {
      throw new Error(`${this.binary} -j neigh show ${address} printed an unexpected payload`);
    }
    return payload;
  }
}
