/**
 * UispNmsClient - Network management adapter
 *
 * Device operations go through PATCH /devices/{id}; suspension is the
 * `enabled` flag plus a suspended attribute so the ONU stays registered.
 *
 * @module packages/adapters/uisp/UispNmsClient
 */

import type { Logger } from 'pino';
import type { INetworkClient, NetworkDevice } from '../../core/ports/index.js';
import { createChildLogger } from '../../../utils/logger.js';
import { ResilientHttpClient, parseResponse } from '../http/ResilientHttpClient.js';
import type { UispClientOptions } from './UispCrmClient.js';
import { nmsDeviceListSchema, type RawNmsDevice } from './schemas.js';

const SERVICE = 'uisp-nms';

const BPS_PER_MBPS = 1_000_000;

/**
 * Normalize a serial number or MAC for comparison
 */
export function normalizeHardwareId(value: string): string {
  return value.trim().toLowerCase().replace(/:/g, '');
}

function toDevice(raw: RawNmsDevice): NetworkDevice {
  const ident = raw.identification;
  return {
    id: ident.id,
    name: ident.name ?? null,
    serialNumber: ident.serialNumber ?? null,
    mac: ident.mac ?? null,
    model: ident.model ?? null,
    authorized: ident.authorized ?? false,
    status: raw.overview?.status ?? null,
  };
}

export class UispNmsClient implements INetworkClient {
  private readonly http: ResilientHttpClient;
  private readonly logger: Logger;

  constructor(options: Omit<UispClientOptions, 'now'>) {
    this.logger = options.logger ?? createChildLogger({ component: 'UispNmsClient' });
    this.http = new ResilientHttpClient({
      service: SERVICE,
      baseUrl: `${options.protocol}://${options.host}/nms/api/v2.1`,
      headers: {
        'x-auth-token': options.apiKey,
        'Content-Type': 'application/json',
      },
      timeoutMs: options.timeoutMs,
      errorThresholdPercentage: options.errorThresholdPercentage,
      resetTimeoutMs: options.resetTimeoutMs,
      fetchImpl: options.fetchImpl,
      logger: this.logger,
    });
  }

  async listDevices(): Promise<NetworkDevice[]> {
    const data = await this.http.get('/devices');
    return parseResponse(SERVICE, 'device list', nmsDeviceListSchema, data).map(toDevice);
  }

  /**
   * Match on serial number or MAC, ignoring case and colons
   */
  async findDeviceBySerial(serial: string): Promise<NetworkDevice | null> {
    const wanted = normalizeHardwareId(serial);
    const devices = await this.listDevices();

    const match = devices.find(
      (d) =>
        (d.serialNumber !== null && normalizeHardwareId(d.serialNumber) === wanted) ||
        (d.mac !== null && normalizeHardwareId(d.mac) === wanted)
    );

    if (!match) {
      this.logger.debug({ serial }, 'No device matches serial');
    }
    return match ?? null;
  }

  async authorizeDevice(deviceId: string, name: string, siteId: string): Promise<void> {
    await this.updateDevice(deviceId, {
      identification: { name, authorized: true, siteId },
    });
  }

  async activateDevice(deviceId: string): Promise<void> {
    await this.updateDevice(deviceId, {
      enabled: true,
      attributes: { suspended: false, suspendedReason: null },
    });
  }

  async suspendDevice(deviceId: string, reason: string): Promise<void> {
    await this.updateDevice(deviceId, {
      enabled: false,
      attributes: { suspended: true, suspendedReason: reason },
    });
  }

  async setDeviceBandwidth(deviceId: string, downloadMbps: number, uploadMbps: number): Promise<void> {
    await this.updateDevice(deviceId, {
      qos: {
        enabled: true,
        downloadSpeed: downloadMbps * BPS_PER_MBPS,
        uploadSpeed: uploadMbps * BPS_PER_MBPS,
      },
    });
  }

  private async updateDevice(deviceId: string, body: Record<string, unknown>): Promise<void> {
    await this.http.patch(`/devices/${encodeURIComponent(deviceId)}`, body);
  }

  shutdown(): void {
    this.http.shutdown();
  }
}
