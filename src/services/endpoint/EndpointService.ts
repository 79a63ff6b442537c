/**
 * EndpointService - ONU activation protocol
 *
 * Resolves (property, unit) to an inventory row and drives the device through
 * the network system, then records the new status in the registry. The local
 * write happens only after the remote calls succeed, so a failure leaves the
 * registry describing what is actually on the network.
 *
 * @module services/endpoint/EndpointService
 */

import type { Logger } from 'pino';
import type { IDeviceRegistry, INetworkClient, ISyncStateStore, NetworkDevice } from '../../packages/core/ports/index.js';
import type { Bandwidth, EndpointRecord } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';
import {
  EndpointNotFoundError,
  EndpointNotProvisionedError,
  logError,
} from '../../utils/errors.js';
import { deriveEndpointName } from './naming.js';
import { normalizeHardwareId } from '../../packages/adapters/uisp/UispNmsClient.js';

/** Reason recorded on freshly provisioned ONUs */
export const AWAITING_TENANT_REASON = 'Awaiting tenant';

export interface EndpointServiceDeps {
  registry: IDeviceRegistry;
  network: INetworkClient;
  /** Site new ONUs are authorized under */
  parentSiteId: string;
  /** Event sink; endpoint transitions are logged when provided */
  events?: Pick<ISyncStateStore, 'logEvent'>;
  logger?: Logger;
}

export interface ProvisionResult {
  provisioned: string[];
  notFound: string[];
  failed: string[];
}

export interface DiscoveredDevice {
  device: NetworkDevice;
  /** Inventory row holding this device's serial or MAC, if any */
  endpointName: string | null;
}

export class EndpointService {
  private readonly registry: IDeviceRegistry;
  private readonly network: INetworkClient;
  private readonly parentSiteId: string;
  private readonly events: Pick<ISyncStateStore, 'logEvent'> | undefined;
  private readonly logger: Logger;

  constructor(deps: EndpointServiceDeps) {
    this.registry = deps.registry;
    this.network = deps.network;
    this.parentSiteId = deps.parentSiteId;
    this.events = deps.events;
    this.logger = deps.logger ?? createChildLogger({ component: 'EndpointService' });
  }

  /**
   * Enable service on the unit's ONU at the given bandwidth
   *
   * @throws EndpointNotFoundError if no inventory row matches
   * @throws EndpointNotProvisionedError if the ONU has no device id yet
   */
  async activate(property: string, unit: string, bandwidth: Bandwidth): Promise<EndpointRecord> {
    return this.activateEndpoint(this.resolve(property, unit), bandwidth);
  }

  /**
   * Disable service on the unit's ONU. The ONU stays registered.
   */
  async suspend(property: string, unit: string, reason: string): Promise<EndpointRecord> {
    return this.suspendEndpoint(this.resolve(property, unit), reason);
  }

  /**
   * Apply a new bandwidth profile without changing activation state
   */
  async setBandwidth(property: string, unit: string, bandwidth: Bandwidth): Promise<EndpointRecord> {
    const endpoint = this.resolve(property, unit);
    await this.network.setDeviceBandwidth(endpoint.deviceId, bandwidth.downloadMbps, bandwidth.uploadMbps);
    this.logger.info(
      { endpoint: endpoint.name, ...bandwidth },
      'Bandwidth updated'
    );
    return endpoint;
  }

  /**
   * Inventory row for a unit, without requiring it to be provisioned
   */
  findEndpoint(property: string, unit: string): EndpointRecord | null {
    return this.registry.findByUnit(property, unit);
  }

  async activateByName(name: string, bandwidth: Bandwidth): Promise<EndpointRecord> {
    return this.activateEndpoint(this.resolveByName(name), bandwidth);
  }

  async suspendByName(name: string, reason: string): Promise<EndpointRecord> {
    return this.suspendEndpoint(this.resolveByName(name), reason);
  }

  /**
   * Register every ONU that has a serial but no device id: find it on the
   * network, authorize it under the parent site with its endpoint name and
   * leave it suspended until a tenant moves in.
   */
  async provisionPending(): Promise<ProvisionResult> {
    const result: ProvisionResult = { provisioned: [], notFound: [], failed: [] };
    const candidates = this.registry.list().filter((e) => e.status === 'unprovisioned');

    for (const endpoint of candidates) {
      try {
        const device = await this.network.findDeviceBySerial(endpoint.serialNumber);
        if (!device) {
          this.logger.warn(
            { endpoint: endpoint.name, serial: endpoint.serialNumber },
            'ONU not found on network'
          );
          result.notFound.push(endpoint.name);
          continue;
        }

        await this.network.authorizeDevice(device.id, endpoint.name, this.parentSiteId);
        await this.network.suspendDevice(device.id, AWAITING_TENANT_REASON);
        this.registry.update(endpoint.name, { status: 'suspended', deviceId: device.id });

        this.events?.logEvent('endpoint_provisioned', { endpoint: endpoint.name, deviceId: device.id });
        this.logger.info({ endpoint: endpoint.name, deviceId: device.id }, 'ONU provisioned');
        result.provisioned.push(endpoint.name);
      } catch (error) {
        logError(this.logger, error, { endpoint: endpoint.name }, 'Failed to provision ONU');
        result.failed.push(endpoint.name);
      }
    }

    return result;
  }

  /**
   * List devices known to the network system, matched to inventory rows
   */
  async discover(): Promise<DiscoveredDevice[]> {
    const byHardwareId = new Map<string, string>();
    for (const endpoint of this.registry.list()) {
      if (endpoint.serialNumber) byHardwareId.set(normalizeHardwareId(endpoint.serialNumber), endpoint.name);
      if (endpoint.macAddress) byHardwareId.set(normalizeHardwareId(endpoint.macAddress), endpoint.name);
    }

    const devices = await this.network.listDevices();
    return devices.map((device) => {
      const keys = [device.serialNumber, device.mac].filter((k): k is string => k !== null);
      const match = keys.map((k) => byHardwareId.get(normalizeHardwareId(k))).find((n) => n !== undefined);
      return { device, endpointName: match ?? null };
    });
  }

  private resolve(property: string, unit: string): EndpointRecord {
    const endpoint = this.registry.findByUnit(property, unit);
    if (!endpoint) {
      throw new EndpointNotFoundError(deriveEndpointName(property, unit));
    }
    return this.requireProvisioned(endpoint);
  }

  private resolveByName(name: string): EndpointRecord {
    const endpoint = this.registry.findByName(name);
    if (!endpoint) {
      throw new EndpointNotFoundError(name);
    }
    return this.requireProvisioned(endpoint);
  }

  private requireProvisioned(endpoint: EndpointRecord): EndpointRecord {
    if (endpoint.status === 'pending' || endpoint.status === 'unprovisioned' || !endpoint.deviceId) {
      throw new EndpointNotProvisionedError(endpoint.name);
    }
    return endpoint;
  }

  private async activateEndpoint(endpoint: EndpointRecord, bandwidth: Bandwidth): Promise<EndpointRecord> {
    if (endpoint.status === 'active') {
      this.logger.debug({ endpoint: endpoint.name }, 'Endpoint already active');
      return endpoint;
    }

    await this.network.activateDevice(endpoint.deviceId);
    await this.network.setDeviceBandwidth(endpoint.deviceId, bandwidth.downloadMbps, bandwidth.uploadMbps);
    const updated = this.registry.update(endpoint.name, { status: 'active' });

    this.events?.logEvent('endpoint_activated', { endpoint: endpoint.name, ...bandwidth });
    this.logger.info({ endpoint: endpoint.name, ...bandwidth }, 'Endpoint activated');
    return updated;
  }

  private async suspendEndpoint(endpoint: EndpointRecord, reason: string): Promise<EndpointRecord> {
    if (endpoint.status === 'suspended') {
      this.logger.debug({ endpoint: endpoint.name }, 'Endpoint already suspended');
      return endpoint;
    }

    await this.network.suspendDevice(endpoint.deviceId, reason);
    const updated = this.registry.update(endpoint.name, { status: 'suspended' });

    this.events?.logEvent('endpoint_suspended', { endpoint: endpoint.name, reason });
    this.logger.info({ endpoint: endpoint.name, reason }, 'Endpoint suspended');
    return updated;
  }
}

/**
 * Message for a provisioning summary line
 */
export function describeProvisionResult(result: ProvisionResult): string {
  return `${result.provisioned.length} provisioned, ${result.notFound.length} not found, ${result.failed.length} failed`;
}
