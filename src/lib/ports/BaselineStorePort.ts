import type { BaselineKey, BaselineRecord } from "@/lib/domain/models";

export interface BaselineStorePort {
  load(key: BaselineKey): Promise<BaselineRecord | null>;
  save(key: BaselineKey, record: BaselineRecord): Promise<void>;
}
