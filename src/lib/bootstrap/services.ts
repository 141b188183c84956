import { DhcpLeaseFileAdapter } from "@/lib/adapters/dhcpLeaseFile";
import { FileBaselineStore } from "@/lib/adapters/fileBaselineStore";
import { IpNeighborAdapter } from "@/lib/adapters/ipNeighbor";
import { MqttMessageBusAdapter } from "@/lib/adapters/mqttMessageBus";
import { NftPacketFilterAdapter } from "@/lib/adapters/nftPacketFilter";
import type { AppConfig } from "@/lib/bootstrap/config";
import type { Logger } from "@/lib/logger";
import type { MessageBusPort } from "@/lib/ports/MessageBusPort";
import { CounterReader } from "@/lib/services/CounterReader";
import { DiscoveryPublisher } from "@/lib/services/DiscoveryPublisher";
import { IdentityResolver } from "@/lib/services/IdentityResolver";
import { RuleSyncService } from "@/lib/services/RuleSyncService";
import { TrafficStateService } from "@/lib/services/TrafficStateService";

export function createRuleSyncService(config: AppConfig, logger: Logger): RuleSyncService {
  const packetFilter = new NftPacketFilterAdapter(config.nft);
  const leaseTable = new DhcpLeaseFileAdapter(config.leasesFile);
  const reader = new CounterReader(packetFilter, logger.child({ component: "counter-reader" }));
  return new RuleSyncService(packetFilter, leaseTable, reader, logger.child({ component: "rule-sync" }));
}

export interface TrafficStateRuntime {
  service: TrafficStateService;
  bus: MessageBusPort;
}

export function createTrafficStateService(config: AppConfig, logger: Logger): TrafficStateRuntime {
  const packetFilter = new NftPacketFilterAdapter(config.nft);
  const reader = new CounterReader(packetFilter, logger.child({ component: "counter-reader" }));
  const resolver = new IdentityResolver(
    new DhcpLeaseFileAdapter(config.leasesFile),
    new IpNeighborAdapter(),
    logger.child({ component: "identity" }),
  );
  const bus = new MqttMessageBusAdapter(config.mqtt);
  const publisher = new DiscoveryPublisher(
    bus,
    { baseTopic: config.baseTopic, discoveryPrefix: config.discoveryPrefix },
    logger.child({ component: "publisher" }),
  );
  const service = new TrafficStateService(
    packetFilter,
    reader,
    resolver,
    new FileBaselineStore(config.stateDir),
    publisher,
    { intervalSeconds: config.intervalSeconds, excludedAddresses: [config.mqtt.host] },
    logger.child({ component: "traffic-state" }),
  );
  return { service, bus };
}
