import { DEVICE_MANUFACTURER, DEVICE_MODEL, TRAFFIC_DIRECTIONS } from "@/lib/domain/constants";
import { describeError } from "@/lib/domain/errors";
import type { DeviceIdentity, SeenSet, TrafficDirection, TrafficReport } from "@/lib/domain/models";
import type { Logger } from "@/lib/logger";
import type { MessageBusPort } from "@/lib/ports/MessageBusPort";
import { macToId } from "@/lib/utils/network";

export interface TopicSettings {
  baseTopic: string;
  discoveryPrefix: string;
}

type MetricKey = "bytes" | "bandwidth" | "daily" | "weekly";

interface MetricDef {
  key: MetricKey;
  label: string;
  field: string;
  unit: string;
  deviceClass: string;
  stateClass: string;
}

const METRICS: readonly MetricDef[] = [
  { key: "bytes", label: "Bytes", field: "bytes", unit: "B", deviceClass: "data_size", stateClass: "total_increasing" },
  { key: "bandwidth", label: "Bandwidth", field: "bw", unit: "B/s", deviceClass: "data_rate", stateClass: "measurement" },
  { key: "daily", label: "Today", field: "daily", unit: "B", deviceClass: "data_size", stateClass: "total_increasing" },
  { key: "weekly", label: "This Week", field: "weekly", unit: "B", deviceClass: "data_size", stateClass: "total_increasing" },
];

const DIRECTION_LABELS: Record<TrafficDirection, string> = {
  in: "In",
  out: "Out",
};

export class DiscoveryPublisher {
  constructor(
    private readonly bus: MessageBusPort,
    private readonly topics: TopicSettings,
    private readonly logger: Logger,
  ) {}

  stateTopic(mac: string, direction: TrafficDirection): string {
    return `${this.topics.baseTopic}/${mac}/${direction}`;
  }

  discoveryTopic(mac: string, direction: TrafficDirection, metric: MetricKey): string {
    return `${this.topics.discoveryPrefix}/sensor/lan_${macToId(mac)}_${direction}_${metric}/config`;
  }

  /**
   * Publishes retained sensor configs for a device the first time its MAC is
   * seen in this run. Returns false when the MAC was already announced.
   */
  async announce(identity: DeviceIdentity, seen: SeenSet): Promise<boolean> {
    if (seen.has(identity.mac)) {
      return false;
    }
    seen.add(identity.mac);

    const macId = macToId(identity.mac);
    const deviceName = `LAN ${identity.name}`;
    const device = {
      identifiers: [`openwrt_${macId}`],
      name: deviceName,
      model: DEVICE_MODEL,
      manufacturer: DEVICE_MANUFACTURER,
      connections: [["mac", identity.mac]],
    };

    for (const direction of TRAFFIC_DIRECTIONS) {
      for (const metric of METRICS) {
        const config = {
          name: `${deviceName} ${DIRECTION_LABELS[direction]} ${metric.label}`,
          state_topic: this.stateTopic(identity.mac, direction),
          value_template: `{{ value_json.${metric.field} }}`,
          unique_id: `openwrt_${macId}_${direction}_${metric.key}`,
          device_class: metric.deviceClass,
          unit_of_measurement: metric.unit,
          state_class: metric.stateClass,
          device,
        };
        await this.send(this.discoveryTopic(identity.mac, direction, metric.key), config, true);
      }
    }
    this.logger.info({ mac: identity.mac, name: identity.name }, "Discovery published (retained)");
    return true;
  }

  /** Returns false when the bus refused the message. */
  async publishState(report: TrafficReport): Promise<boolean> {
    const payload = {
      ip: report.address,
      mac: report.mac,
      name: report.name,
      dir: report.direction,
      bytes: report.bytes,
      packets: report.packets,
      bw: report.bandwidth,
      daily: report.daily,
      weekly: report.weekly,
      ts: report.timestamp,
    };
    const topic = this.stateTopic(report.mac, report.direction);
    this.logger.debug({ topic, payload }, "Publishing state");
    return this.send(topic, payload, false);
  }

  private async send(topic: string, payload: object, retain: boolean): Promise<boolean> {
    try {
      await this.bus.publish(topic, JSON.stringify(payload), { retain });
      return true;
    } catch (error) {
      this.logger.warn({ topic, retain, err: describeError(error) }, "MQTT publish failed");
      return false;
    }
  }
}
