export interface PublishOptions {
  retain: boolean;
}

export interface MessageBusPort {
  publish(topic: string, payload: string, options: PublishOptions): Promise<void>;
  close(): Promise<void>;
}
