/**
 * The slice of an MQTT client the service needs, so the transport and the
 * exposure can run against mqtt.js or an in-process stand-in.
 */
export interface MqttDriver {
  publish(topic: string, payload: string, options?: { qos?: 0 | 1 | 2; retain?: boolean }): Promise<void>;
  subscribe(topic: string): Promise<void>;
  onMessage(callback: (topic: string, payload: Buffer) => void): void;
}
