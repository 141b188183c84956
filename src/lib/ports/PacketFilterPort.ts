import type { DeviceAddress, PacketFilterRule, TrafficDirection } from "@/lib/domain/models";

export interface CounterRuleRequest {
  address: DeviceAddress;
  direction: TrafficDirection;
  tag: string;
}

export interface PacketFilterPort {
  hasChain(): Promise<boolean>;
  ensureTable(): Promise<void>;
  ensureChain(): Promise<void>;
  listRules(): Promise<PacketFilterRule[]>;
  addCounterRule(request: CounterRuleRequest): Promise<void>;
  deleteRule(handle: number): Promise<void>;
}
