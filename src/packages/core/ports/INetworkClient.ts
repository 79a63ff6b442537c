/**
 * Network Management Client Interface
 *
 * Device-level operations on ONUs: lookup, authorization, activation,
 * suspension and bandwidth limits.
 *
 * @module packages/core/ports/INetworkClient
 */

export interface NetworkDevice {
  id: string;
  name: string | null;
  serialNumber: string | null;
  mac: string | null;
  model: string | null;
  authorized: boolean;
  status: string | null;
}

export interface INetworkClient {
  listDevices(): Promise<NetworkDevice[]>;
  findDeviceBySerial(serial: string): Promise<NetworkDevice | null>;
  authorizeDevice(deviceId: string, name: string, siteId: string): Promise<void>;
  activateDevice(deviceId: string): Promise<void>;
  suspendDevice(deviceId: string, reason: string): Promise<void>;
  setDeviceBandwidth(deviceId: string, downloadMbps: number, uploadMbps: number): Promise<void>;
}
