import type { TrafficDirection } from "@/lib/domain/models";

export const RULE_TAG_NAMESPACE = "tm";
export const RULE_TAG_SEPARATOR = ":";

// Order in which missing rules are created for an address.
export const TRAFFIC_DIRECTIONS: readonly TrafficDirection[] = ["out", "in"];

export const LEASE_HOSTNAME_PLACEHOLDER = "*";

export const DEVICE_MODEL = "OpenWrt nft counters";
export const DEVICE_MANUFACTURER = "OpenWrt";
