import { TRAFFIC_DIRECTIONS } from "@/lib/domain/constants";
import { describeError } from "@/lib/domain/errors";
import type {
  DeviceAddress,
  OwnedRule,
  SyncFailure,
  SyncReport,
  TrafficDirection,
} from "@/lib/domain/models";
import { encodeRuleTag } from "@/lib/domain/ruleTag";
import type { Logger } from "@/lib/logger";
import type { LeaseTablePort } from "@/lib/ports/LeaseTablePort";
import type { PacketFilterPort } from "@/lib/ports/PacketFilterPort";
import type { CounterReader } from "@/lib/services/CounterReader";
import { isIPv4Address } from "@/lib/utils/network";

function emptyReport(status: SyncReport["status"], leasedAddresses = 0): SyncReport {
  return { status, leasedAddresses, added: 0, deleted: 0, kept: 0, failures: [] };
}

function ruleKey(address: DeviceAddress, direction: TrafficDirection): string {
  return `${address}/${direction}`;
}

/**
 * Keeps one counter rule per leased IPv4 address and direction in the owned
 * chain. Rules are only ever added with a `counter` statement; the chain
 * policy is never changed.
 */
export class RuleSyncService {
  constructor(
    private readonly packetFilter: PacketFilterPort,
    private readonly leaseTable: LeaseTablePort,
    private readonly reader: CounterReader,
    private readonly logger: Logger,
  ) {}

  async runCycle(): Promise<SyncReport> {
    try {
      await this.packetFilter.ensureTable();
      await this.packetFilter.ensureChain();
    } catch (error) {
      this.logger.error({ err: describeError(error) }, "Unable to prepare nft table and chain");
      return emptyReport("failed");
    }

    const desired = await this.desiredAddresses();
    if (desired === null) {
      return emptyReport("skipped");
    }
    if (desired.length === 0) {
      this.logger.warn("No DHCP IPv4 addresses found in leases, leaving rules untouched");
      return emptyReport("skipped");
    }
    this.logger.info({ count: desired.length }, "Found unique DHCP IPv4 addresses in leases");

    let owned: OwnedRule[];
    try {
      owned = await this.reader.listOwned();
    } catch (error) {
      this.logger.error({ err: describeError(error) }, "Unable to list counter rules");
      return emptyReport("failed", desired.length);
    }

    const report = emptyReport("completed", desired.length);
    const present = new Map<string, OwnedRule>();
    const redundant: OwnedRule[] = [];
    for (const rule of owned) {
      const key = ruleKey(rule.address, rule.direction);
      if (present.has(key)) {
        redundant.push(rule);
      } else {
        present.set(key, rule);
      }
    }

    await this.addMissing(desired, present, report);

    const leased = new Set(desired);
    const stale = [...present.values()].filter((rule) => !leased.has(rule.address));
    report.kept = present.size - stale.length;
    const staleDeleted = await this.deleteRules(stale, "no longer leased", report);
    await this.deleteRules(redundant, "duplicate", report);

    this.logger.info(
      {
        added: report.added,
        deleted: report.deleted,
        kept: report.kept,
        failures: report.failures.length,
        managedRules: present.size - staleDeleted + report.added,
      },
      "Rule sync done",
    );
    return report;
  }

  /** Unique valid IPv4 addresses in lease order, or null when the table is unreadable. */
  private async desiredAddresses(): Promise<DeviceAddress[] | null> {
    try {
      const leases = await this.leaseTable.readLeases();
      const addresses = leases.map((lease) => lease.address).filter(isIPv4Address);
      return [...new Set(addresses)];
    } catch (error) {
      this.logger.warn({ err: describeError(error) }, "Lease table not readable, nothing to do");
      return null;
    }
  }

  private async addMissing(
    desired: DeviceAddress[],
    present: ReadonlyMap<string, OwnedRule>,
    report: SyncReport,
  ): Promise<void> {
    for (const address of desired) {
      for (const direction of TRAFFIC_DIRECTIONS) {
        if (present.has(ruleKey(address, direction))) {
          this.logger.debug({ address, direction }, "Rule already exists");
          continue;
        }
        const tag = encodeRuleTag(address, direction);
        try {
          await this.packetFilter.addCounterRule({ address, direction, tag });
          report.added += 1;
          this.logger.info({ address, direction, tag }, "Added counter rule");
        } catch (error) {
          this.recordFailure(report, { action: "add", address, direction, message: describeError(error) });
        }
      }
    }
  }

  /** Returns how many of `rules` were deleted. */
  private async deleteRules(rules: OwnedRule[], reason: string, report: SyncReport): Promise<number> {
    let deleted = 0;
    for (const rule of rules) {
      try {
        await this.packetFilter.deleteRule(rule.handle);
        deleted += 1;
        report.deleted += 1;
        this.logger.info({ handle: rule.handle, tag: rule.tag, reason }, "Deleted counter rule");
      } catch (error) {
        this.recordFailure(report, {
          action: "delete",
          address: rule.address,
          direction: rule.direction,
          message: describeError(error),
        });
      }
    }
    return deleted;
  }

  private recordFailure(report: SyncReport, failure: SyncFailure): void {
    report.failures.push(failure);
    this.logger.warn(failure, `Failed to ${failure.action} counter rule`);
  }
}
