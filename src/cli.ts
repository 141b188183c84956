import { loadConfig, type AppConfig } from "@/lib/bootstrap/config";
import { createRuleSyncService, createTrafficStateService } from "@/lib/bootstrap/services";
import { describeError } from "@/lib/domain/errors";
import { createLogger, type Logger } from "@/lib/logger";

const USAGE = "usage: nft-traffic-meter <sync|publish>";

async function runSync(config: AppConfig, logger: Logger): Promise<number> {
  logger.info(
    { table: `${config.nft.family}/${config.nft.table}`, chain: config.nft.chain, leases: config.leasesFile },
    "Starting rule sync",
  );
  const report = await createRuleSyncService(config, logger).runCycle();
  return report.status === "failed" ? 1 : 0;
}

async function runPublish(config: AppConfig, logger: Logger): Promise<number> {
  logger.info(
    { broker: config.mqtt.host, baseTopic: config.baseTopic, discovery: config.discoveryPrefix, interval: config.intervalSeconds },
    "Starting traffic publish",
  );
  const { service, bus } = createTrafficStateService(config, logger);
  try {
    const report = await service.runCycle();
    return report.status === "failed" ? 1 : 0;
  } finally {
    await bus.close();
  }
}

async function main(argv: string[]): Promise<number> {
  const command = argv[0];
  if (command !== "sync" && command !== "publish") {
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    process.stderr.write(`Invalid configuration: ${describeError(error)}\n`);
    return 1;
  }

  const logger = createLogger(config.logLevel, command === "sync" ? "traffic-sync" : "mqtt-traffic");
  return command === "sync" ? runSync(config, logger) : runPublish(config, logger);
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${describeError(error)}\n`);
    process.exitCode = 1;
  },
);
