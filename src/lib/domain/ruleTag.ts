import { RULE_TAG_NAMESPACE, RULE_TAG_SEPARATOR } from "@/lib/domain/constants";
import type { DeviceAddress, TrafficDirection } from "@/lib/domain/models";
import { isIPv4Address } from "@/lib/utils/network";

export interface RuleTag {
  address: DeviceAddress;
  direction: TrafficDirection;
}

function isTrafficDirection(value: string): value is TrafficDirection {
  return value === "in" || value === "out";
}

export function encodeRuleTag(address: DeviceAddress, direction: TrafficDirection): string {
  return [RULE_TAG_NAMESPACE, address, direction].join(RULE_TAG_SEPARATOR);
}

/**
 * Returns null for any tag this system does not own, including truncated or
 * malformed ones, so rules written by other tooling pass through untouched.
 */
export function decodeRuleTag(tag: string | null | undefined): RuleTag | null {
  if (!tag) {
    return null;
  }
  const parts = tag.split(RULE_TAG_SEPARATOR);
  if (parts.length !== 3) {
    return null;
  }
  const [namespace, address, direction] = parts;
  if (namespace !== RULE_TAG_NAMESPACE || !isIPv4Address(address)) {
    return null;
  }
  if (!isTrafficDirection(direction)) {
    return null;
  }
  return { address, direction };
}
