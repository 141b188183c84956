import type { BaselineKey, BaselineRecord } from "@/lib/domain/models";
import type { BaselineStorePort } from "@/lib/ports/BaselineStorePort";

function keyOf({ mac, direction }: BaselineKey): string {
  return `${mac}_${direction}`;
}

export class MemoryBaselineStore implements BaselineStorePort {
  private readonly records = new Map<string, BaselineRecord>();
  readonly failingSaves = new Set<string>();

  load(key: BaselineKey): Promise<BaselineRecord | null> {
    const record = this.records.get(keyOf(key));
    return Promise.resolve(record ? { ...record } : null);
  }

  save(key: BaselineKey, record: BaselineRecord): Promise<void> {
    if (this.failingSaves.has(keyOf(key))) {
      return Promise.reject(new Error(`save refused for ${keyOf(key)}`));
    }
    this.records.set(keyOf(key), { ...record });
    return Promise.resolve();
  }

  get size(): number {
    return this.records.size;
  }
}
