import { ConfigError } from "@/lib/domain/errors";
import { LOG_LEVELS, type LogLevel } from "@/lib/logger";

export interface AppConfig {
  mqtt: {
    host: string;
    port: number;
    username?: string;
    password?: string;
  };
  baseTopic: string;
  discoveryPrefix: string;
  intervalSeconds: number;
  stateDir: string;
  leasesFile: string;
  nft: {
    family: string;
    table: string;
    chain: string;
  };
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function text(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === "" ? undefined : value;
}

function positiveInteger(env: Env, name: string, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || Number(raw) < 1 || Number(raw) > max) {
    throw new ConfigError(name, `expected an integer between 1 and ${max}, got "${raw}"`);
  }
  return Number(raw);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function logLevel(env: Env): LogLevel {
  const raw = text(env, "LOG_LEVEL", "info").toLowerCase();
  if (!isLogLevel(raw)) {
    throw new ConfigError("LOG_LEVEL", `expected one of ${LOG_LEVELS.join(", ")}, got "${raw}"`);
  }
  return raw;
}

function topic(env: Env, name: string, fallback: string): string {
  const value = text(env, name, fallback).replace(/\/+$/, "");
  if (!value || /[#+]/.test(value)) {
    throw new ConfigError(name, `"${value}" is not a valid topic prefix`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    mqtt: {
      host: text(env, "MQTT_BROKER", "127.0.0.1"),
      port: positiveInteger(env, "MQTT_PORT", 1883, 65535),
      username: optional(env, "MQTT_USER"),
      password: optional(env, "MQTT_PASS"),
    },
    baseTopic: topic(env, "BASE_TOPIC", "network/usage"),
    discoveryPrefix: topic(env, "DISCOVERY_PREFIX", "homeassistant"),
    intervalSeconds: positiveInteger(env, "BW_INTERVAL", 5),
    stateDir: text(env, "STATE_DIR", "/tmp/traffic-monitor"),
    leasesFile: text(env, "LEASES_FILE", "/tmp/dhcp.leases"),
    nft: {
      family: text(env, "NFT_FAMILY", "inet"),
      table: text(env, "NFT_TABLE", "traffic_monitor"),
      chain: text(env, "NFT_CHAIN", "forward"),
    },
    logLevel: logLevel(env),
  };
}
