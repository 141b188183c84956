import type { Logger } from "@/lib/logger";
import { decodeRuleTag } from "@/lib/domain/ruleTag";
import type { CounterRule, OwnedRule } from "@/lib/domain/models";
import type { PacketFilterPort } from "@/lib/ports/PacketFilterPort";

export class CounterReader {
  constructor(
    private readonly packetFilter: PacketFilterPort,
    private readonly logger: Logger,
  ) {}

  /** Rules carrying one of our tags, in listing order. Foreign rules are ignored. */
  async listOwned(): Promise<OwnedRule[]> {
    const rules = await this.packetFilter.listRules();
    const owned: OwnedRule[] = [];
    for (const rule of rules) {
      const tag = decodeRuleTag(rule.comment);
      if (!tag || rule.comment === undefined) {
        continue;
      }
      owned.push({
        handle: rule.handle,
        tag: rule.comment,
        address: tag.address,
        direction: tag.direction,
        counter: rule.counter,
      });
    }
    return owned;
  }

  async readCounters(): Promise<CounterRule[]> {
    const owned = await this.listOwned();
    const samples: CounterRule[] = [];
    for (const rule of owned) {
      if (!rule.counter) {
        this.logger.warn({ handle: rule.handle, tag: rule.tag }, "Dropping rule with unparsable counter");
        continue;
      }
      samples.push({
        handle: rule.handle,
        tag: rule.tag,
        address: rule.address,
        direction: rule.direction,
        bytes: rule.counter.bytes,
        packets: rule.counter.packets,
      });
    }
    return samples;
  }
}
