import type { IpNeighborEntry, NftExpression, NftListResponse, NftRule } from "@/lib/api/types";
import type { LeaseEntry, PacketCounter, PacketFilterRule } from "@/lib/domain/models";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function isRuleObject(entry: unknown): entry is { rule: NftRule } {
  return isRecord(entry) && isRecord(entry.rule);
}

function counterStatement(expression: unknown): unknown {
  return isRecord(expression) ? expression.counter : undefined;
}

function mapCounter(expressions: NftExpression[] | undefined): PacketCounter | undefined {
  for (const expression of expressions ?? []) {
    const counter = counterStatement(expression);
    if (counter === undefined) {
      continue;
    }
    if (isRecord(counter) && isCount(counter.bytes) && isCount(counter.packets)) {
      return { bytes: counter.bytes, packets: counter.packets };
    }
    return undefined;
  }
  return undefined;
}

function mapRule(rule: NftRule): PacketFilterRule | null {
  if (!isCount(rule.handle)) {
    return null;
  }
  return {
    handle: rule.handle,
    comment: typeof rule.comment === "string" ? rule.comment : undefined,
    counter: mapCounter(Array.isArray(rule.expr) ? rule.expr : undefined),
  };
}

/**
 * Extracts the rules of a `nft -j list chain` listing in listing order. Objects
 * other than rules, and rules without a usable handle, are left out.
 */
export function mapNftListing(response: NftListResponse): PacketFilterRule[] {
  const rules: PacketFilterRule[] = [];
  for (const entry of response.nftables) {
    if (!isRuleObject(entry)) {
      continue;
    }
    const rule = mapRule(entry.rule);
    if (rule) {
      rules.push(rule);
    }
  }
  return rules;
}

export function mapNeighborLladdr(entries: IpNeighborEntry[], address: string): string | null {
  const entry = entries.find(
    (candidate) => candidate.dst === address && typeof candidate.lladdr === "string",
  );
  return entry?.lladdr ?? null;
}

/** Parses one dnsmasq lease line: `expiry mac ip hostname [clientid]`. */
export function parseLeaseLine(line: string): LeaseEntry | null {
  const fields = line.trim().split(/\s+/);
  if (fields.length < 4) {
    return null;
  }
  const [expiry, mac, address, hostname, clientId] = fields;
  const expiresAt = Number(expiry);
  if (!Number.isInteger(expiresAt)) {
    return null;
  }
  return {
    expiresAt,
    mac: mac.toLowerCase(),
    address,
    hostname,
    clientId: clientId && clientId !== "*" ? clientId : undefined,
  };
}
