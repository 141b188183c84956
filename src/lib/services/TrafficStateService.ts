import { setTimeout as sleep } from "node:timers/promises";

import { advanceBaseline, computeBandwidth } from "@/lib/domain/baseline";
import { describeError } from "@/lib/domain/errors";
import type {
  BaselineKey,
  BaselineRecord,
  CounterRule,
  DeviceAddress,
  LeaseIndex,
  SeenSet,
  TrafficCycleReport,
  TrafficDirection,
  TrafficReport,
} from "@/lib/domain/models";
import type { Logger } from "@/lib/logger";
import type { BaselineStorePort } from "@/lib/ports/BaselineStorePort";
import type { PacketFilterPort } from "@/lib/ports/PacketFilterPort";
import type { CounterReader } from "@/lib/services/CounterReader";
import type { DiscoveryPublisher } from "@/lib/services/DiscoveryPublisher";
import type { IdentityResolver } from "@/lib/services/IdentityResolver";
import { toEpochSeconds } from "@/lib/utils/date";

export interface TrafficStateOptions {
  intervalSeconds: number;
  /** Addresses never published, such as the broker itself. */
  excludedAddresses: readonly DeviceAddress[];
  wait?: (milliseconds: number) => Promise<unknown>;
  now?: () => Date;
}

interface SampleWithRate {
  sample: CounterRule;
  bandwidth: number;
}

type EntryOutcome = "published" | "skipped" | "failed";

function sampleKey(address: DeviceAddress, direction: TrafficDirection): string {
  return `${address}/${direction}`;
}

export function joinSnapshots(
  first: readonly CounterRule[],
  second: readonly CounterRule[],
  intervalSeconds: number,
): SampleWithRate[] {
  const previous = new Map<string, number>();
  for (const sample of first) {
    const key = sampleKey(sample.address, sample.direction);
    if (!previous.has(key)) {
      previous.set(key, sample.bytes);
    }
  }
  return second.map((sample) => ({
    sample,
    bandwidth: computeBandwidth(
      previous.get(sampleKey(sample.address, sample.direction)),
      sample.bytes,
      intervalSeconds,
    ),
  }));
}

/**
 * One sampling cycle: two counter snapshots `intervalSeconds` apart, then per
 * entry identity resolution, baseline update and publication.
 */
export class TrafficStateService {
  private readonly wait: (milliseconds: number) => Promise<unknown>;
  private readonly now: () => Date;

  constructor(
    private readonly packetFilter: PacketFilterPort,
    private readonly reader: CounterReader,
    private readonly resolver: IdentityResolver,
    private readonly store: BaselineStorePort,
    private readonly publisher: DiscoveryPublisher,
    private readonly options: TrafficStateOptions,
    private readonly logger: Logger,
  ) {
    this.wait = options.wait ?? ((milliseconds) => sleep(milliseconds));
    this.now = options.now ?? (() => new Date());
  }

  async runCycle(): Promise<TrafficCycleReport> {
    const report: TrafficCycleReport = { status: "completed", processed: 0, published: 0, skipped: 0, failed: 0 };

    let first: CounterRule[];
    try {
      if (!(await this.packetFilter.hasChain())) {
        this.logger.error("Missing nft table or chain, run the rule sync first");
        return { ...report, status: "failed" };
      }
      first = await this.reader.readCounters();
    } catch (error) {
      this.logger.error({ err: describeError(error) }, "Unable to read counters");
      return { ...report, status: "failed" };
    }

    if (first.length === 0) {
      this.logger.warn("No counters matched, nothing to publish");
      return { ...report, status: "skipped" };
    }

    await this.wait(this.options.intervalSeconds * 1000);

    let second: CounterRule[];
    try {
      second = await this.reader.readCounters();
    } catch (error) {
      this.logger.error({ err: describeError(error) }, "Unable to read counters");
      return { ...report, status: "failed" };
    }

    const samples = joinSnapshots(first, second, this.options.intervalSeconds);
    const leases = await this.resolver.loadLeases();
    const seen: SeenSet = new Set();

    for (const entry of samples) {
      report.processed += 1;
      const outcome = await this.processEntry(entry, leases, seen);
      if (outcome === "published") {
        report.published += 1;
      } else if (outcome === "skipped") {
        report.skipped += 1;
      } else {
        report.failed += 1;
      }
    }

    this.logger.info(
      { matched: samples.length, published: report.published, skipped: report.skipped, failed: report.failed },
      "Traffic cycle done",
    );
    return report;
  }

  private async processEntry(
    { sample, bandwidth }: SampleWithRate,
    leases: LeaseIndex,
    seen: SeenSet,
  ): Promise<EntryOutcome> {
    const { address, direction } = sample;
    if (this.options.excludedAddresses.includes(address)) {
      this.logger.debug({ address }, "Skipping excluded address");
      return "skipped";
    }

    const identity = await this.resolver.resolve(address, leases);
    if (!identity) {
      this.logger.warn({ address, direction }, "No MAC found for address, skipping");
      return "skipped";
    }

    const key: BaselineKey = { mac: identity.mac, direction };
    const sampledAt = this.now();
    const update = advanceBaseline(await this.loadBaseline(key), sample.bytes, sampledAt);

    // Persist before publishing so a crash never leaves published figures
    // ahead of the stored baseline.
    try {
      await this.store.save(key, update.record);
    } catch (error) {
      this.logger.error({ ...key, err: describeError(error) }, "Unable to save baseline, not publishing");
      return "failed";
    }

    await this.publisher.announce(identity, seen);
    const published = await this.publisher.publishState({
      address,
      mac: identity.mac,
      name: identity.name,
      direction,
      bytes: sample.bytes,
      packets: sample.packets,
      bandwidth,
      daily: update.daily,
      weekly: update.weekly,
      timestamp: toEpochSeconds(sampledAt),
    } satisfies TrafficReport);
    return published ? "published" : "failed";
  }

  private async loadBaseline(key: BaselineKey): Promise<BaselineRecord | null> {
    try {
      return await this.store.load(key);
    } catch (error) {
      this.logger.warn({ ...key, err: describeError(error) }, "Unable to load baseline, starting over");
      return null;
    }
  }
}
