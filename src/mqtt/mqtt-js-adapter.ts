import type { MqttClient } from "mqtt";
import type { MqttDriver } from "./mqtt-driver.js";

export class MqttJsAdapter implements MqttDriver {
  constructor(private readonly client: MqttClient) {}

  publish(topic: string, payload: string, options?: { qos?: 0 | 1 | 2; retain?: boolean }): Promise<void> {
    if (!this.client.connected) {
      return Promise.reject(new Error("MQTT client is not connected"));
    }
    return new Promise((resolve, reject) => {
      this.client.publish(topic, payload, { qos: options?.qos ?? 0, retain: options?.retain ?? false }, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  subscribe(topic: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.client.subscribe(topic, { qos: 0 }, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  onMessage(callback: (topic: string, payload: Buffer) => void): void {
    this.client.on("message", (topic, payload) => {
      callback(topic, payload);
    });
  }
}
