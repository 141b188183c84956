import type { PacketCounter, PacketFilterRule } from "@/lib/domain/models";
import type { CounterRuleRequest, PacketFilterPort } from "@/lib/ports/PacketFilterPort";

interface MockRule {
  handle: number;
  comment?: string;
  counter?: PacketCounter;
}

function cloneRule(rule: MockRule): PacketFilterRule {
  return {
    handle: rule.handle,
    comment: rule.comment,
    counter: rule.counter ? { ...rule.counter } : undefined,
  };
}

/** In-process stand-in for an nftables chain. */
export class MockPacketFilterAdapter implements PacketFilterPort {
  private rules: MockRule[] = [];
  private nextHandle = 2;
  private table = false;
  private chain = false;

  readonly added: CounterRuleRequest[] = [];
  readonly deleted: number[] = [];
  readonly failingAdds = new Set<string>();
  readonly failingDeletes = new Set<number>();
  listingFailure: Error | null = null;
  containerFailure: Error | null = null;

  constructor(options: { withChain?: boolean } = {}) {
    if (options.withChain) {
      this.table = true;
      this.chain = true;
    }
  }

  get ruleCount(): number {
    return this.rules.length;
  }

  hasChain(): Promise<boolean> {
    return Promise.resolve(this.table && this.chain);
  }

  ensureTable(): Promise<void> {
    if (this.containerFailure) {
      return Promise.reject(this.containerFailure);
    }
    this.table = true;
    return Promise.resolve();
  }

  ensureChain(): Promise<void> {
    if (this.containerFailure) {
      return Promise.reject(this.containerFailure);
    }
    this.chain = true;
    return Promise.resolve();
  }

  listRules(): Promise<PacketFilterRule[]> {
    if (this.listingFailure) {
      return Promise.reject(this.listingFailure);
    }
    return Promise.resolve(this.rules.map(cloneRule));
  }

  addCounterRule(request: CounterRuleRequest): Promise<void> {
    if (this.failingAdds.has(request.tag)) {
      return Promise.reject(new Error(`add rejected for ${request.tag}`));
    }
    this.added.push({ ...request });
    this.insertRule(request.tag, { bytes: 0, packets: 0 });
    return Promise.resolve();
  }

  deleteRule(handle: number): Promise<void> {
    if (this.failingDeletes.has(handle)) {
      return Promise.reject(new Error(`delete rejected for handle ${handle}`));
    }
    const index = this.rules.findIndex((rule) => rule.handle === handle);
    if (index === -1) {
      return Promise.reject(new Error(`No rule with handle ${handle}`));
    }
    this.rules.splice(index, 1);
    this.deleted.push(handle);
    return Promise.resolve();
  }

  /** Adds a rule directly, bypassing the call log. Returns its handle. */
  insertRule(comment: string | undefined, counter?: PacketCounter): number {
    const handle = this.nextHandle;
    this.nextHandle += 1;
    this.rules.push({ handle, comment, counter: counter ? { ...counter } : undefined });
    return handle;
  }

  setCounter(comment: string, counter: PacketCounter | undefined): void {
    const rule = this.rules.find((entry) => entry.comment === comment);
    if (!rule) {
      throw new Error(`No rule with comment ${comment}`);
    }
    rule.counter = counter ? { ...counter } : undefined;
  }

  comments(): (string | undefined)[] {
    return this.rules.map((rule) => rule.comment);
  }
}
