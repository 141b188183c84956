import { IpNeighborClient } from "@/lib/api/client";
import type { CommandRunner } from "@/lib/api/command";
import { mapNeighborLladdr } from "@/lib/api/transformers";
import type { DeviceAddress } from "@/lib/domain/models";
import type { NeighborCachePort } from "@/lib/ports/NeighborCachePort";

export class IpNeighborAdapter implements NeighborCachePort {
  private readonly client: IpNeighborClient;

  constructor(run?: CommandRunner) {
    this.client = new IpNeighborClient(run);
  }

  async lookupMac(address: DeviceAddress): Promise<string | null> {
    const entries = await this.client.show(address);
    return mapNeighborLladdr(entries, address);
  }
}
