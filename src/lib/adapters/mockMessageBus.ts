import type { MessageBusPort, PublishOptions } from "@/lib/ports/MessageBusPort";

export interface PublishedMessage {
  topic: string;
  payload: string;
  retain: boolean;
}

export class MockMessageBusAdapter implements MessageBusPort {
  readonly messages: PublishedMessage[] = [];
  readonly failingTopics = new Set<string>();
  closed = false;

  publish(topic: string, payload: string, { retain }: PublishOptions): Promise<void> {
    if (this.failingTopics.has(topic)) {
      return Promise.reject(new Error(`publish to ${topic} refused`));
    }
    this.messages.push({ topic, payload, retain });
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }

  topics(): string[] {
    return this.messages.map((message) => message.topic);
  }

  payloadsFor(topic: string): unknown[] {
    return this.messages
      .filter((message) => message.topic === topic)
      .map((message): unknown => JSON.parse(message.payload));
  }
}
