// src/types/mass-types.ts

// !=============================================================================
// ! JSON
// !=============================================================================
export type JsonPrimitive = string | number | boolean | null;
// undefined members are dropped by JSON.stringify, so optional fields stay serializable
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue | undefined };
export type JsonObject = { [key: string]: JsonValue | undefined };

// !=============================================================================
// ! Envelope
// !=============================================================================
/** Device identity block present in every envelope */
export interface DeviceAddress {
  flag: string;
  serialNumber: string;
}

export type MessageStatus = 'success' | 'fail';

/** Common header fields of every envelope */
export interface EnvelopeHeader {
  device: DeviceAddress;
  function: string;
  referenceId: string;
  streaming?: boolean;
}

export interface Envelope extends EnvelopeHeader {
  messageStatus?: MessageStatus;
  request?: JsonValue;
  response?: JsonValue;
  notification?: JsonValue;
}

/** Envelope as received from the server; the device block is optional inbound */
export interface InboundEnvelope extends Omit<Envelope, 'device'> {
  device?: DeviceAddress;
}

/** Which body key an outbound payload is written under */
export type BodyKind = 'response' | 'notification';

/** Payload produced by a function handler, before the header is attached */
export interface OutboundMessage {
  function: string;
  kind: BodyKind;
  body: JsonValue;
  messageStatus?: MessageStatus;
}

/** Routing metadata published next to the frame (MQTT v5 user properties) */
export type RoutingProperties = Record<string, string>;

// !=============================================================================
// ! Device model
// !=============================================================================
export type DeviceIdentity = {
  flag: string;
  serialNumber: string;
  brand: string;
  model: string;
  protocolVersion: string;
  firmware: string;
  manufactureDate: string;
};

export type DeviceTelemetry = {
  registered: boolean;
  signal: number;
  cpuTemp: number;
};

export type TelemetryUpdate = Partial<DeviceTelemetry>;

export type DeviceSettings = {
  daylightSaving: boolean;
  timezone: string;
  restartPeriod: number;
  networkId: string;
  retryInterval: number;
  retryCount: number;
};

export type MeterType = 'electricity' | 'water' | 'gas';

export type MeterDescriptor = {
  protocol: string;
  type: MeterType;
  brand: string;
  serialNumber: string;
  serialPort: string;
  initBaud: number;
  fixBaud: boolean;
  frame: string;
};

/** Meter reference used inside alarms, logs and read responses */
export type MeterReference = {
  brand: string;
  serialNumber: string;
};

export type EntryId = string | number;

/** Schedule and notification descriptors are opaque beyond their id */
export type CollectionEntry = {
  id: EntryId;
  [key: string]: JsonValue;
};

export type ServerEndpoint = {
  ip: string;
  tcpPort: number;
  udpPort: number;
  primary: boolean;
};

export type CommunicationInterface = {
  id: number;
  type: string;
  imei: string;
  phoneNumber: string;
  ip: string;
  port: number;
  apn: { user: string; pwd: string };
  simId: string;
  imsi: string;
};

export type SerialPortDescriptor = {
  id: number;
  type: 'rs485' | 'rs232';
  name: string;
  port: number;
};

export type IoInterfaceType = 'relay' | 'dryContact' | 'digitalInput';

export type IoInterfaceDescriptor = {
  id: number;
  type: IoInterfaceType;
  name: string;
};

/** Static hardware description reported by identification */
export type HardwareProfile = {
  servers: ServerEndpoint[];
  ntp: { server: string; port: number };
  ipWhiteList: string[];
  communicationInterfaces: CommunicationInterface[];
  serialPorts: SerialPortDescriptor[];
  ioInterfaces: IoInterfaceDescriptor[];
  modules: string[];
};

export type DeviceSnapshot = {
  identity: DeviceIdentity;
  telemetry: DeviceTelemetry;
  settings: DeviceSettings;
  deviceDate: string;
  meters: MeterDescriptor[];
  schedules: CollectionEntry[];
  notifications: CollectionEntry[];
};

export type Clock = () => Date;

// !=============================================================================
// ! Logging
// !=============================================================================
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Context appended to a log line */
export interface LogContext {
  logger?: string;
  fn?: string;
  ref?: string;
  topic?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Transport
// !=============================================================================
export type MqttQos = 0 | 1 | 2;

export interface PublishMetadata {
  userProperties?: RoutingProperties;
}

export type MessageHandler = (topic: string, payload: Uint8Array, metadata: PublishMetadata) => void;
export type ConnectionStateHandler = (connected: boolean) => void;

/** Bidirectional, topic-addressed byte-message channel */
export interface MessageTransport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  subscribe(topic: string): Promise<void>;
  publish(topic: string, payload: Uint8Array, metadata?: PublishMetadata): Promise<void>;
  setMessageHandler(handler: MessageHandler): void;
  setConnectionStateHandler(handler: ConnectionStateHandler): void;
}

// !=============================================================================
// ! Heartbeat
// !=============================================================================
export interface HeartbeatStats {
  ticks: number;
  published: number;
  failures: number;
  lastError: string | null;
  lastRunTime: number | null;
}
