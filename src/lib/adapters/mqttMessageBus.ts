import { connectAsync, type IClientOptions } from "mqtt";

import type { MessageBusPort, PublishOptions } from "@/lib/ports/MessageBusPort";

export interface MqttBusOptions {
  host: string;
  port: number;
  username?: string;
  password?: string;
}

export interface MqttConnection {
  publishAsync(topic: string, message: string, options: { qos: 0; retain: boolean }): Promise<unknown>;
  endAsync(): Promise<void>;
}

export type MqttConnect = (url: string, options: IClientOptions) => Promise<MqttConnection>;

const CONNECT_TIMEOUT_MS = 10_000;

const defaultConnect: MqttConnect = (url, options) => connectAsync(url, options);

/**
 * Connects on the first publish and keeps one connection for the rest of the
 * run. A failed connect fails every later publish of the run as well; the next
 * run starts over.
 */
export class MqttMessageBusAdapter implements MessageBusPort {
  private connection: Promise<MqttConnection> | null = null;
  private connected: MqttConnection | null = null;

  constructor(
    private readonly options: MqttBusOptions,
    private readonly connect: MqttConnect = defaultConnect,
  ) {}

  get url(): string {
    return `mqtt://${this.options.host}:${this.options.port}`;
  }

  private client(): Promise<MqttConnection> {
    if (!this.connection) {
      this.connection = this.connect(this.url, {
        username: this.options.username,
        password: this.options.password,
        connectTimeout: CONNECT_TIMEOUT_MS,
        reconnectPeriod: 0,
      }).then((client) => {
        this.connected = client;
        return client;
      });
    }
    return this.connection;
  }

  async publish(topic: string, payload: string, { retain }: PublishOptions): Promise<void> {
    const client = await this.client();
    await client.publishAsync(topic, payload, { qos: 0, retain });
  }

  async close(): Promise<void> {
    const client = this.connected;
    this.connection = null;
    this.connected = null;
    if (client) {
      await client.endAsync();
    }
  }
}
