// src/device-state/device-state.ts

import { Mutex } from 'async-mutex';
import { DEFAULT_TELEMETRY } from '../constants/constants.js';
import { DuplicateKeyError } from '../errors.js';
import { formatDeviceDate } from '../utils/utils.js';
import { EntryCollection } from './entry-collection.js';
import { DEFAULT_HARDWARE_PROFILE, DEFAULT_SETTINGS } from './defaults.js';
import {
  Clock,
  CollectionEntry,
  DeviceAddress,
  DeviceIdentity,
  DeviceSettings,
  DeviceSnapshot,
  DeviceTelemetry,
  EntryId,
  HardwareProfile,
  MeterDescriptor,
  TelemetryUpdate,
} from '../types/mass-types.js';

export interface DeviceStoreOptions {
  identity: DeviceIdentity;
  telemetry?: TelemetryUpdate;
  settings?: Partial<DeviceSettings>;
  hardware?: HardwareProfile;
  clock?: Clock;
}

export type IdentityUpdate = Partial<Pick<DeviceIdentity, 'flag' | 'serialNumber' | 'firmware'>>;

const TELEMETRY_KEYS = ['registered', 'signal', 'cpuTemp'] as const;
const SETTINGS_KEYS = [
  'daylightSaving',
  'timezone',
  'restartPeriod',
  'networkId',
  'retryInterval',
  'retryCount',
] as const;

function assignDefined<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): boolean {
  if (value === undefined) return false;
  target[key] = value;
  return true;
}

/**
 * Synchronous in-memory model of the unit. Not safe to share between
 * concurrent callers on its own; {@link DeviceState} serializes access to it.
 */
export class DeviceStore {
  private identity: DeviceIdentity;
  private telemetry: DeviceTelemetry;
  private settings: DeviceSettings;
  private readonly initialTelemetry: DeviceTelemetry;
  private readonly hardware: HardwareProfile;
  private readonly clock: Clock;
  private clockOffsetMs: number = 0;
  private readonly meters: MeterDescriptor[] = [];
  readonly schedules = new EntryCollection('schedules');
  readonly notifications = new EntryCollection('notifications');

  constructor(options: DeviceStoreOptions) {
    this.identity = { ...options.identity };
    this.initialTelemetry = { ...DEFAULT_TELEMETRY, ...options.telemetry };
    this.telemetry = { ...this.initialTelemetry };
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.hardware = structuredClone(options.hardware ?? DEFAULT_HARDWARE_PROFILE);
    this.clock = options.clock ?? (() => new Date());
  }

  snapshot(): DeviceSnapshot {
    return {
      identity: { ...this.identity },
      telemetry: { ...this.telemetry },
      settings: { ...this.settings },
      deviceDate: this.deviceDateText(),
      meters: this.listMeters(),
      schedules: this.schedules.list(),
      notifications: this.notifications.list(),
    };
  }

  address(): DeviceAddress {
    return { flag: this.identity.flag, serialNumber: this.identity.serialNumber };
  }

  getIdentity(): DeviceIdentity {
    return { ...this.identity };
  }

  getTelemetry(): DeviceTelemetry {
    return { ...this.telemetry };
  }

  getSettings(): DeviceSettings {
    return { ...this.settings };
  }

  getHardware(): HardwareProfile {
    return structuredClone(this.hardware);
  }

  /**
   * Applies only the supplied fields.
   * @returns names of the fields that were supplied
   */
  updateTelemetry(update: TelemetryUpdate): string[] {
    const applied: string[] = [];
    for (const key of TELEMETRY_KEYS) {
      if (assignDefined(this.telemetry, key, update[key])) applied.push(key);
    }
    return applied;
  }

  updateIdentity(update: IdentityUpdate): string[] {
    const applied: string[] = [];
    if (update.flag !== undefined) {
      this.identity.flag = update.flag;
      applied.push('flag');
    }
    if (update.serialNumber !== undefined) {
      this.identity.serialNumber = update.serialNumber;
      applied.push('serialNumber');
    }
    if (update.firmware !== undefined) {
      this.identity.firmware = update.firmware;
      applied.push('firmware');
    }
    return applied;
  }

  updateSettings(update: Partial<DeviceSettings>): string[] {
    const applied: string[] = [];
    for (const key of SETTINGS_KEYS) {
      if (assignDefined(this.settings, key, update[key])) applied.push(key);
    }
    return applied;
  }

  /**
   * Moves the device clock so that it reads `date` now.
   */
  setDeviceDate(date: Date): void {
    this.clockOffsetMs = date.getTime() - this.clock().getTime();
  }

  deviceDate(): Date {
    return new Date(this.clock().getTime() + this.clockOffsetMs);
  }

  deviceDateText(): string {
    return formatDeviceDate(this.deviceDate());
  }

  /**
   * Restores registration, signal, CPU temperature and the device clock.
   */
  resetTelemetry(): void {
    this.telemetry = { ...this.initialTelemetry };
    this.clockOffsetMs = 0;
  }

  /**
   * @throws DuplicateKeyError if a meter with the same serial number exists
   */
  addMeter(descriptor: MeterDescriptor): void {
    if (this.findMeter(descriptor.serialNumber)) {
      throw new DuplicateKeyError('meters', descriptor.serialNumber);
    }
    this.meters.push({ ...descriptor });
  }

  findMeter(serialNumber: string): MeterDescriptor | undefined {
    const meter = this.meters.find(m => m.serialNumber === serialNumber);
    return meter ? { ...meter } : undefined;
  }

  listMeters(): MeterDescriptor[] {
    return this.meters.map(meter => ({ ...meter }));
  }
}

/**
 * Owned device model shared by the router, the heartbeat scheduler and
 * the trigger surface. Every access goes through one mutex.
 */
export class DeviceState {
  private readonly mutex = new Mutex();
  private readonly store: DeviceStore;

  constructor(options: DeviceStoreOptions) {
    this.store = new DeviceStore(options);
  }

  /**
   * Runs `fn` against the store while holding the lock.
   */
  async transaction<T>(fn: (store: DeviceStore) => T): Promise<T> {
    const release = await this.mutex.acquire();
    try {
      return fn(this.store);
    } finally {
      release();
    }
  }

  getSnapshot(): Promise<DeviceSnapshot> {
    return this.transaction(store => store.snapshot());
  }

  getAddress(): Promise<DeviceAddress> {
    return this.transaction(store => store.address());
  }

  updateTelemetry(update: TelemetryUpdate): Promise<string[]> {
    return this.transaction(store => store.updateTelemetry(update));
  }

  resetTelemetry(): Promise<void> {
    return this.transaction(store => store.resetTelemetry());
  }

  addMeter(descriptor: MeterDescriptor): Promise<void> {
    return this.transaction(store => store.addMeter(descriptor));
  }

  listMeters(): Promise<MeterDescriptor[]> {
    return this.transaction(store => store.listMeters());
  }

  addSchedules(entries: CollectionEntry[]): Promise<void> {
    return this.transaction(store => store.schedules.add(entries));
  }

  listSchedules(): Promise<CollectionEntry[]> {
    return this.transaction(store => store.schedules.list());
  }

  removeSchedule(id: EntryId): Promise<void> {
    return this.transaction(store => {
      store.schedules.remove(id);
    });
  }

  addNotifications(entries: CollectionEntry[]): Promise<void> {
    return this.transaction(store => store.notifications.add(entries));
  }

  listNotifications(): Promise<CollectionEntry[]> {
    return this.transaction(store => store.notifications.list());
  }

  removeNotification(id: EntryId): Promise<void> {
    return this.transaction(store => {
      store.notifications.remove(id);
    });
  }
}
