import { EventEmitter } from 'events';
import { connectAsync, MqttClient } from 'mqtt';
import { v4 as uuidv4 } from 'uuid';
import config from '../config/index.js';
import { encodeCommand, isWakeCommand, OasisCommand, toMessagePayload } from '../codec/commands.js';
import { parseTopicValue } from '../codec/status-codec.js';
import type { OasisDevice } from '../device/device.js';
import { ValidationError } from '../errors.js';
import { AsyncEvent, delay, untilAborted } from '../utils/async.js';
import { BoundedQueue } from '../utils/bounded-queue.js';
import { errorMessage, getLogger } from '../utils/logger.js';
import { CommandTransport } from './command-transport.js';

const log = getLogger('mqtt-client');

const MAC_WAIT_MS = 3000;
const READY_TIMEOUT_MS = 10000;

export const statusTopic = (serial: string): string => `${serial}/STATUS/#`;
export const commandTopic = (serial: string): string => `${serial}/COMMAND/CMD`;

/**
 * One live broker session. `closed` settles when the session ends for any
 * reason; a new session is opened for every reconnect.
 */
export interface BrokerConnection {
  subscribe(topic: string): Promise<void>;
  unsubscribe(topic: string): Promise<void>;
  publish(topic: string, payload: string): Promise<void>;
  onMessage(handler: (topic: string, payload: string) => void): void;
  readonly closed: Promise<void>;
  end(): Promise<void>;
}

export interface BrokerOptions {
  url: string;
  username?: string;
  password?: string;
  keepalive: number;
  connectTimeout: number;
}

export type BrokerConnector = (options: BrokerOptions) => Promise<BrokerConnection>;

/**
 * Opens a session with mqtt.js. Automatic reconnects are disabled: the
 * client's own loop decides when to retry.
 */
export async function connectMqtt(options: BrokerOptions): Promise<BrokerConnection> {
  const client: MqttClient = await connectAsync(
    options.url,
    {
      clientId: `oasis-control-${uuidv4()}`,
      username: options.username,
      password: options.password,
      keepalive: options.keepalive,
      connectTimeout: options.connectTimeout,
      reconnectPeriod: 0,
    },
    false
  );

  client.on('error', (error) => {
    log.error('MQTT client error', { error: error.message });
  });

  const closed = new Promise<void>((resolve) => {
    if (!client.connected) {
      resolve();
      return;
    }
    client.once('close', () => resolve());
  });

  return {
    async subscribe(topic) {
      await client.subscribeAsync(topic, { qos: 1 });
    },
    async unsubscribe(topic) {
      await client.unsubscribeAsync(topic);
    },
    async publish(topic, payload) {
      await client.publishAsync(topic, payload, { qos: 1 });
    },
    onMessage(handler) {
      client.on('message', (topic, payload) => handler(topic, payload.toString('utf8')));
    },
    closed,
    async end() {
      await client.endAsync();
    },
  };
}

export type ConnectionState = 'stopped' | 'connecting' | 'connected' | 'disconnected';

export interface OasisMqttClientEvents {
  connected: () => void;
  disconnected: () => void;
  stateChange: (state: ConnectionState) => void;
}

export interface OasisMqttClientOptions {
  username?: string;
  password?: string;
  /** Broker URL, `wss://<host>:<port>/<path>` from config by default. */
  url?: string;
  keepalive?: number;
  connectTimeout?: number;
  reconnectInterval?: number;
  maxPendingCommands?: number;
  connector?: BrokerConnector;
}

interface PendingCommand {
  serial: string;
  payload: string;
}

/**
 * Persistent transport shared by any number of devices. Keeps one broker
 * session alive, reconnecting forever until `stop()`, and queues commands
 * while offline.
 */
export class OasisMqttClient extends CommandTransport {
  private readonly url: string;
  private readonly username?: string;
  private readonly password?: string;
  private readonly keepalive: number;
  private readonly connectTimeout: number;
  private readonly reconnectInterval: number;
  private readonly connector: BrokerConnector;

  private readonly devices = new Map<string, OasisDevice>();
  private readonly initializedEvents = new Map<string, AsyncEvent>();
  private readonly macEvents = new Map<string, AsyncEvent>();
  private readonly subscribed = new Set<string>();
  private readonly queue: BoundedQueue<PendingCommand>;
  private readonly connectedEvent = new AsyncEvent();

  private readonly events = new EventEmitter();
  private connection: BrokerConnection | null = null;
  /** Set while a new session drains the queue; publishes keep queuing meanwhile. */
  private flushing = false;
  private abortController: AbortController | null = null;
  private loopTask: Promise<void> | null = null;
  private state: ConnectionState = 'stopped';
  private connectedSince: Date | null = null;

  constructor(options: OasisMqttClientOptions = {}) {
    super();
    this.url = options.url ?? `wss://${config.mqtt.host}:${config.mqtt.port}/${config.mqtt.path}`;
    this.username = options.username ?? config.mqtt.username;
    this.password = options.password ?? config.mqtt.password;
    this.keepalive = options.keepalive ?? config.mqtt.keepalive;
    this.connectTimeout = options.connectTimeout ?? config.mqtt.connectTimeout;
    this.reconnectInterval = options.reconnectInterval ?? config.mqtt.reconnectInterval;
    this.connector = options.connector ?? connectMqtt;
    this.queue = new BoundedQueue(options.maxPendingCommands ?? config.mqtt.maxPendingCommands);
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  get isConnected(): boolean {
    return this.connection !== null;
  }

  get connectedAt(): Date | null {
    return this.connectedSince;
  }

  get pendingCommands(): number {
    return this.queue.size;
  }

  get registeredSerials(): string[] {
    return [...this.devices.keys()];
  }

  on<U extends keyof OasisMqttClientEvents>(event: U, listener: OasisMqttClientEvents[U]): this {
    this.events.on(event, listener);
    return this;
  }

  off<U extends keyof OasisMqttClientEvents>(event: U, listener: OasisMqttClientEvents[U]): this {
    this.events.off(event, listener);
    return this;
  }

  private emit<U extends keyof OasisMqttClientEvents>(event: U, ...args: Parameters<OasisMqttClientEvents[U]>): void {
    this.events.emit(event, ...args);
  }

  // ============ Devices ============

  registerDevice(device: OasisDevice): void {
    const serial = device.serialNumber;
    if (!serial) {
      throw new ValidationError('Cannot register a device without a serial number', 'serialNumber');
    }

    this.devices.set(serial, device);
    if (!this.initializedEvents.has(serial)) this.initializedEvents.set(serial, new AsyncEvent());
    if (!this.macEvents.has(serial)) this.macEvents.set(serial, new AsyncEvent());

    if (!device.transport) {
      device.attachTransport(this);
    }

    if (this.connection) {
      void this.subscribeSerial(this.connection, serial);
    }
  }

  unregisterDevice(device: OasisDevice): void {
    const serial = device.serialNumber;
    if (!serial || !this.devices.delete(serial)) return;

    this.initializedEvents.delete(serial);
    this.macEvents.delete(serial);

    const wasSubscribed = this.subscribed.delete(serial);
    if (this.connection && wasSubscribed) {
      void this.unsubscribeSerial(this.connection, serial);
    }
  }

  private async subscribeSerial(connection: BrokerConnection, serial: string): Promise<void> {
    if (this.subscribed.has(serial)) return;
    this.subscribed.add(serial);
    try {
      await connection.subscribe(statusTopic(serial));
      log.debug(`Subscribed to ${statusTopic(serial)}`);
    } catch (error) {
      this.subscribed.delete(serial);
      log.warn(`Failed to subscribe to ${statusTopic(serial)}: ${errorMessage(error)}`);
    }
  }

  private async unsubscribeSerial(connection: BrokerConnection, serial: string): Promise<void> {
    try {
      await connection.unsubscribe(statusTopic(serial));
    } catch (error) {
      log.warn(`Failed to unsubscribe from ${statusTopic(serial)}: ${errorMessage(error)}`);
    }
  }

  // ============ Connection loop ============

  start(): void {
    if (this.loopTask) return;
    const controller = new AbortController();
    this.abortController = controller;
    this.loopTask = this.run(controller.signal);
  }

  /**
   * Stops the loop, closes the session and discards queued commands.
   */
  async stop(): Promise<void> {
    const controller = this.abortController;
    const task = this.loopTask;
    this.abortController = null;
    this.loopTask = null;

    controller?.abort();
    if (task) await task;

    const discarded = this.queue.clear();
    if (discarded > 0) {
      log.info(`Discarded ${discarded} queued command(s)`);
    }
    this.setState('stopped');
  }

  async close(): Promise<void> {
    await this.stop();
  }

  private setState(state: ConnectionState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit('stateChange', state);
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      this.setState('connecting');
      try {
        await this.session(signal);
      } catch (error) {
        if (!signal.aborted) {
          log.warn(`MQTT connection error: ${errorMessage(error)}`);
        }
      }
      if (signal.aborted) break;

      this.setState('disconnected');
      log.info(`Reconnecting in ${this.reconnectInterval} ms`);
      await delay(this.reconnectInterval, signal);
    }
  }

  private async session(signal: AbortSignal): Promise<void> {
    log.info(`Connecting to MQTT broker at ${this.url}`);
    const connection = await this.connector({
      url: this.url,
      username: this.username,
      password: this.password,
      keepalive: this.keepalive,
      connectTimeout: this.connectTimeout,
    });

    try {
      if (signal.aborted) return;

      this.flushing = true;
      this.connection = connection;
      this.connectedSince = new Date();
      this.connectedEvent.set();
      this.setState('connected');
      log.info('Connected to MQTT broker');
      this.emit('connected');

      connection.onMessage((topic, payload) => this.handleMessage(topic, payload));

      for (const serial of this.devices.keys()) {
        await this.subscribeSerial(connection, serial);
      }
      await this.flushQueue(connection);

      await untilAborted(connection.closed, signal);
    } finally {
      const wasConnected = this.connection === connection;
      this.connection = null;
      this.flushing = false;
      this.connectedSince = null;
      this.connectedEvent.clear();
      this.subscribed.clear();

      try {
        await connection.end();
      } catch (error) {
        log.debug(`Error closing MQTT session: ${errorMessage(error)}`);
      }

      if (wasConnected) {
        log.info('Disconnected from MQTT broker');
        this.emit('disconnected');
      }
    }
  }

  // ============ Inbound ============

  private handleMessage(topic: string, payload: string): void {
    const parts = topic.split('/');
    if (parts.length < 3) return;

    const [serial, , suffix] = parts;
    const device = this.devices.get(serial);
    if (!device) {
      log.debug(`Ignoring message for unregistered device ${serial}`);
      return;
    }

    try {
      const result = parseTopicValue(suffix, payload);
      switch (result.kind) {
        case 'unknown':
          log.warn(result.error.message, { serialNumber: serial });
          return;
        case 'invalid':
          log.error(result.error.message, { serialNumber: serial });
          return;
        case 'update':
          device.applyFieldMap(result.fields);
          if (result.fields.macAddress) {
            this.macEvents.get(serial)?.set();
          }
          break;
      }

      if (device.isInitialized) {
        this.initializedEvents.get(serial)?.set();
      }
    } catch (error) {
      log.error(`Error handling message on ${topic}`, { error: errorMessage(error) });
    }
  }

  // ============ Outbound ============

  private requireSerial(device: OasisDevice): string {
    if (!device.serialNumber) {
      throw new ValidationError('Device has no serial number', 'serialNumber');
    }
    return device.serialNumber;
  }

  protected async dispatch(device: OasisDevice, command: OasisCommand): Promise<void> {
    const serial = this.requireSerial(device);
    if (isWakeCommand(command) && device.isSleeping) {
      await this.publish(serial, toMessagePayload(encodeCommand({ type: 'getAll' })));
    }
    await this.publish(serial, toMessagePayload(encodeCommand(command)));
  }

  private async publish(serial: string, payload: string): Promise<void> {
    const connection = this.connection;
    if (!connection || this.flushing) {
      log.debug(`${connection ? 'Flushing' : 'Not connected'}, queuing ${payload} for ${serial}`);
      this.enqueue({ serial, payload });
      return;
    }

    try {
      await connection.publish(commandTopic(serial), payload);
      log.debug(`Sent ${payload} to ${serial}`);
    } catch (error) {
      log.warn(`Publish to ${serial} failed, queuing: ${errorMessage(error)}`);
      this.enqueue({ serial, payload });
    }
  }

  private enqueue(command: PendingCommand): void {
    const dropped = this.queue.push(command);
    if (dropped) {
      log.warn(`Command queue full, dropped ${dropped.payload} for ${dropped.serial}`);
    }
  }

  /**
   * Drains the queue in order, including commands queued while draining,
   * then lets publishes go straight to the broker. On a failed publish the
   * unsent commands go back ahead of newer ones.
   */
  private async flushQueue(connection: BrokerConnection): Promise<void> {
    while (!this.queue.isEmpty()) {
      const pending = this.queue.toArray();
      this.queue.clear();

      for (let i = 0; i < pending.length; i++) {
        const { serial, payload } = pending[i];
        if (!this.devices.has(serial)) {
          log.debug(`Skipping queued ${payload} for unregistered device ${serial}`);
          continue;
        }
        try {
          await connection.publish(commandTopic(serial), payload);
          log.debug(`Sent queued ${payload} to ${serial}`);
        } catch (error) {
          log.warn(`Failed to flush queued commands: ${errorMessage(error)}`);
          const newer = this.queue.toArray();
          this.queue.clear();
          [...pending.slice(i), ...newer].forEach((command) => this.enqueue(command));
          this.flushing = false;
          return;
        }
      }
    }
    this.flushing = false;
  }

  // ============ Queries ============

  async getStatus(device: OasisDevice): Promise<void> {
    await this.dispatch(device, { type: 'getStatus' });
  }

  async getMacAddress(device: OasisDevice, timeoutMs = MAC_WAIT_MS): Promise<string | null> {
    if (device.macAddress) return device.macAddress;

    const serial = this.requireSerial(device);
    let macEvent = this.macEvents.get(serial);
    if (!macEvent) {
      macEvent = new AsyncEvent();
      this.macEvents.set(serial, macEvent);
    }
    macEvent.clear();
    await this.getStatus(device);

    if (!(await macEvent.wait(timeoutMs))) {
      log.warn(`Timed out waiting for MAC address of ${serial}`);
    }
    return device.macAddress;
  }

  /**
   * Waits for the broker connection, then (optionally after requesting a
   * status refresh) for the device to report serial, MAC and software
   * version. Each wait is bounded by `timeoutMs`.
   */
  async waitUntilReady(device: OasisDevice, timeoutMs = READY_TIMEOUT_MS, requestStatus = true): Promise<boolean> {
    const serial = this.requireSerial(device);

    if (!(await this.connectedEvent.wait(timeoutMs))) {
      log.warn(`Timed out waiting for MQTT connection (${serial})`);
      return false;
    }

    const initialized = this.initializedEvents.get(serial);
    if (!initialized) {
      log.warn(`Device ${serial} is not registered`);
      return false;
    }

    if (requestStatus) {
      initialized.clear();
      try {
        await this.getStatus(device);
      } catch (error) {
        log.debug(`Status request for ${serial} failed: ${errorMessage(error)}`);
      }
    }

    if (!(await initialized.wait(timeoutMs))) {
      log.warn(`Timed out waiting for ${serial} to initialize`);
      return false;
    }
    return true;
  }
}
