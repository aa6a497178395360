// src/device-state/defaults.ts

import { DeviceSettings, HardwareProfile } from '../types/mass-types.js';

export const DEFAULT_MANUFACTURE_DATE = '2023-05-23';

export const DEFAULT_SETTINGS: DeviceSettings = {
  daylightSaving: true,
  timezone: '+03:00',
  restartPeriod: 8,
  networkId: '',
  retryInterval: 10,
  retryCount: 3,
};

/**
 * Fixed hardware description of the simulated unit
 */
export const DEFAULT_HARDWARE_PROFILE: HardwareProfile = {
  servers: [{ ip: '123.45.68.10', tcpPort: 1234, udpPort: 4567, primary: true }],
  ntp: { server: '', port: 0 },
  ipWhiteList: ['123.45.68.10'],
  communicationInterfaces: [
    {
      id: 1,
      type: 'gsm',
      imei: '123456789012345',
      phoneNumber: '5012345678',
      ip: '123.45.68.9',
      port: 3030,
      apn: { user: 'osos', pwd: '' },
      simId: '',
      imsi: '',
    },
  ],
  serialPorts: [
    { id: 1, type: 'rs485', name: 'rs485-1', port: 7000 },
    { id: 2, type: 'rs485', name: 'rs485-2', port: 7001 },
    { id: 3, type: 'rs232', name: 'rs232', port: 7002 },
  ],
  ioInterfaces: [
    { id: 1, type: 'relay', name: 'relay-1' },
    { id: 2, type: 'relay', name: 'relay-2' },
    { id: 3, type: 'dryContact', name: 'dry-1' },
    { id: 4, type: 'digitalInput', name: 'panoKapagi' },
    { id: 5, type: 'digitalInput', name: 'digitalInput-2' },
  ],
  modules: [],
};
