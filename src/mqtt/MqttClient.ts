// MQTT bridge to the physical LED controller
import mqtt, { type MqttClient as MqttJsClient } from 'mqtt';
import type { Color } from '../core/Color';
import type { StripType } from '../core/DeviceSink';
import type { LedTransport } from '../core/HardwareSink';
import type { VendorAnimation } from '../engine/vendor';
import { commandTopic, statusTopic } from './topics';

export type LedCommand =
  | { action: 'set_leds'; r: number; g: number; b: number; w: number; start: number; count: number }
  | { action: 'animate'; animation: VendorAnimation }
  | { action: 'configure'; stripType: StripType };

export type StatusHandler = (status: Record<string, unknown>) => void;

export class MqttClient implements LedTransport {
  private client: MqttJsClient | null = null;
  private deviceId: number = 0;
  private statusHandler: StatusHandler | null = null;
  private stripType: StripType | null = null;
  private _connected = false;
  private onStatusChange: ((connected: boolean) => void) | null = null;

  onLog?: (msg: string) => void;

  get connected(): boolean {
    return this._connected;
  }

  private log(msg: string): void {
    this.onLog?.(msg);
    console.log(msg);
  }

  setStatusCallback(cb: (connected: boolean) => void): void {
    this.onStatusChange = cb;
  }

  onDeviceStatus(handler: StatusHandler): void {
    this.statusHandler = handler;
  }

  connect(brokerUrl: string, username: string, password: string, deviceId: number): Promise<void> {
    return new Promise((resolve, reject) => {
      this.deviceId = deviceId;
      const clientId = `led-engine-${deviceId}`;
      let settled = false;

      const client = mqtt.connect(brokerUrl, {
        username,
        password,
        clientId,
        protocolVersion: 4,
        reconnectPeriod: 5000,
        connectTimeout: 10000,
      });
      this.client = client;

      client.on('connect', () => {
        this.log('[MQTT] Connected');
        this._connected = true;
        this.onStatusChange?.(true);

        client.subscribe(statusTopic(deviceId), { qos: 1 });
        // The controller may have restarted while we were away
        if (this.stripType) {
          this.publish({ action: 'configure', stripType: this.stripType });
        }
        if (!settled) {
          settled = true;
          resolve();
        }
      });

      client.on('error', (err) => {
        console.error('[MQTT] Error:', err);
        if (!settled) {
          settled = true;
          reject(err);
        }
      });

      client.on('close', () => {
        this._connected = false;
        this.onStatusChange?.(false);
      });

      client.on('message', (topic: string, payload: Uint8Array) => {
        this.handleMessage(topic, payload);
      });
    });
  }

  disconnect(): void {
    if (this.client) {
      this.client.end(true);
      this.client = null;
      this._connected = false;
      this.onStatusChange?.(false);
    }
  }

  setLeds(color: Color, start: number, count: number): void {
    this.publish({ action: 'set_leds', r: color.r, g: color.g, b: color.b, w: 0, start, count });
  }

  animate(animation: VendorAnimation): void {
    this.publish({ action: 'animate', animation });
  }

  configure(stripType: StripType): void {
    this.stripType = stripType;
    this.publish({ action: 'configure', stripType });
  }

  private publish(command: LedCommand): void {
    if (!this.client) {
      throw new Error(`[MQTT] Not connected, cannot send ${command.action}`);
    }
    // While reconnecting mqtt.js queues the message and sends it once back online
    this.client.publish(commandTopic(this.deviceId), JSON.stringify(command), { qos: 1 });
  }

  private handleMessage(topic: string, payload: Uint8Array): void {
    if (topic !== statusTopic(this.deviceId)) return;

    const text = new TextDecoder().decode(payload);
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      this.log(`[MQTT] Ignoring non-JSON status: ${text.slice(0, 64)}`);
      return;
    }
    if (data && typeof data === 'object' && !Array.isArray(data)) {
      this.statusHandler?.({ ...data });
    }
  }
}
