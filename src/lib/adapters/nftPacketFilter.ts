import { NftClient, type NftTarget } from "@/lib/api/client";
import type { CommandRunner } from "@/lib/api/command";
import { mapNftListing } from "@/lib/api/transformers";
import type { PacketFilterRule } from "@/lib/domain/models";
import type { CounterRuleRequest, PacketFilterPort } from "@/lib/ports/PacketFilterPort";

export class NftPacketFilterAdapter implements PacketFilterPort {
  private readonly client: NftClient;

  constructor(target: NftTarget, run?: CommandRunner) {
    this.client = new NftClient(target, run);
  }

  async hasChain(): Promise<boolean> {
    return this.client.chainExists();
  }

  async ensureTable(): Promise<void> {
    if (!(await this.client.tableExists())) {
      await this.client.addTable();
    }
  }

  async ensureChain(): Promise<void> {
    if (!(await this.client.chainExists())) {
      await this.client.addForwardChain();
    }
  }

  async listRules(): Promise<PacketFilterRule[]> {
    const listing = await this.client.listChain();
    return mapNftListing(listing);
  }

  async addCounterRule({ address, direction, tag }: CounterRuleRequest): Promise<void> {
    const field = direction === "out" ? "saddr" : "daddr";
    await this.client.addCounterRule(["ip", field, address], tag);
  }

  async deleteRule(handle: number): Promise<void> {
    await this.client.deleteRule(handle);
  }
}
