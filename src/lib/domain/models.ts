export type DeviceAddress = string;

export type TrafficDirection = "in" | "out";

export interface PacketCounter {
  bytes: number;
  packets: number;
}

export interface PacketFilterRule {
  handle: number;
  comment?: string;
  counter?: PacketCounter;
}

export interface OwnedRule {
  handle: number;
  tag: string;
  address: DeviceAddress;
  direction: TrafficDirection;
  counter?: PacketCounter;
}

export interface CounterRule {
  handle: number;
  tag: string;
  address: DeviceAddress;
  direction: TrafficDirection;
  bytes: number;
  packets: number;
}

export interface LeaseEntry {
  expiresAt: number;
  mac: string;
  address: DeviceAddress;
  hostname: string;
  clientId?: string;
}

export type LeaseIndex = ReadonlyMap<DeviceAddress, LeaseEntry>;

export interface DeviceIdentity {
  mac: string;
  name: string;
}

export interface BaselineRecord {
  lastBytes: number;
  lastSampleTime: number;
  dayBytes: number | null;
  dayKey: string | null;
  weekBytes: number | null;
  weekKey: string | null;
}

export interface BaselineKey {
  mac: string;
  direction: TrafficDirection;
}

export interface TrafficReport {
  address: DeviceAddress;
  mac: string;
  name: string;
  direction: TrafficDirection;
  bytes: number;
  packets: number;
  bandwidth: number;
  daily: number;
  weekly: number;
  timestamp: number;
}

export type SeenSet = Set<string>;

export type CycleStatus = "completed" | "skipped" | "failed";

export interface SyncFailure {
  action: "add" | "delete";
  address: DeviceAddress;
  direction: TrafficDirection;
  message: string;
}

export interface SyncReport {
  status: CycleStatus;
  leasedAddresses: number;
  added: number;
  deleted: number;
  kept: number;
  failures: SyncFailure[];
}

export interface TrafficCycleReport {
  status: CycleStatus;
  processed: number;
  published: number;
  skipped: number;
  failed: number;
}
