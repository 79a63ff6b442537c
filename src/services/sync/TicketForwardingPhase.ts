/**
 * Ticket Forwarding Phase
 *
 * Open maintenance tickets are classified once and acted on:
 * - upgrade requests change the lease's package (bandwidth, recurring
 *   charge, billing plan, lease record)
 * - internet support requests become tickets in the billing system
 * - anything else is left alone and looked at again next cycle
 *
 * A ticket is recorded as forwarded only after every step succeeded.
 *
 * @module services/sync/TicketForwardingPhase
 */

import type { Logger } from 'pino';
import type { PmMaintenanceTicket } from '../../packages/core/ports/index.js';
import type { LeaseRecord, ServicePackage } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { DataResolutionError, errorMessage, logError } from '../../utils/errors.js';
import { findOrCreateCompanyClient } from '../billing/companyClient.js';
import { applyPackageCharge } from './charges.js';
import { classifyTicket } from './classification.js';
import { resolveTicketUnit } from './resolution.js';
import { emptyResult, type PhaseResult, type SyncDependencies, type SyncPhase } from './context.js';

/**
 * Subject of a forwarded support ticket, carrying the unit for traceability
 */
export function forwardedSubject(unit: string | null, subject: string): string {
  return `[Unit ${unit ?? 'unknown'}] ${subject || 'Internet issue'}`;
}

export function forwardedMessage(ticket: PmMaintenanceTicket, unit: string | null): string {
  return [
    `Forwarded from property management (ticket #${ticket.id})`,
    '',
    `Unit: ${unit ?? 'Unknown'}`,
    `Subject: ${ticket.subject || 'Internet issue'}`,
    '',
    'Description:',
    ticket.description || 'No description',
  ].join('\n');
}

export class TicketForwardingPhase implements SyncPhase {
  readonly name = 'tickets' as const;
  private readonly logger: Logger;
  private ticketClientId: string | null;

  constructor(
    private readonly deps: SyncDependencies,
    logger?: Logger
  ) {
    this.logger = logger ?? createChildLogger({ component: 'TicketForwardingPhase' });
    this.ticketClientId = deps.config.uisp.ticketClientId ?? null;
  }

  async run(now: Date): Promise<PhaseResult> {
    const { config, propertyManagement, store } = this.deps;
    const result = emptyResult();

    const tickets = await propertyManagement.getMaintenanceTickets(config.propertyManagement.propertyId, 'open');

    for (const ticket of tickets) {
      if (store.isTicketForwarded(ticket.id)) continue;

      const intent = classifyTicket(ticket.subject, ticket.description, config.keywords, config.packages);
      if (intent.kind === 'unclassified') {
        this.logger.debug({ ticketId: ticket.id }, 'Ticket not internet related');
        continue;
      }

      result.processed++;
      try {
        if (intent.kind === 'upgrade') {
          await this.handleUpgrade(ticket, intent.servicePackage, now);
        } else {
          await this.forwardSupport(ticket);
        }
        result.changed++;
      } catch (error) {
        result.failed++;
        logError(this.logger, error, { ticketId: ticket.id, classification: intent.kind }, 'Failed to handle ticket');
        store.logEvent('ticket_failed', { ticketId: ticket.id, classification: intent.kind, error: errorMessage(error) });
      }
    }

    return result;
  }

  private async handleUpgrade(ticket: PmMaintenanceTicket, pkg: ServicePackage, now: Date): Promise<void> {
    const { billing, endpoints, store } = this.deps;

    const unit = resolveTicketUnit(ticket, this.logger);
    if (!unit) {
      throw new DataResolutionError(`Upgrade ticket ${ticket.id} does not name a unit`, 'unit');
    }
    const lease = this.findLeaseForUnit(unit);
    if (!lease) {
      throw new DataResolutionError(`No active lease for unit ${unit} (ticket ${ticket.id})`, 'unit');
    }

    if (lease.packageName === pkg.name) {
      store.recordTicketForward(ticket.id, `lease:${lease.leaseId}`, 'upgrade');
      this.logger.info({ ticketId: ticket.id, leaseId: lease.leaseId, package: pkg.name }, 'Lease already on requested package');
      return;
    }

    await endpoints.setBandwidth(lease.propertyAddress, lease.unitId, pkg);

    let record = await applyPackageCharge(this.deps, lease, pkg, now, this.logger);

    if (record.billingServiceId && pkg.servicePlanId) {
      await billing.updateService(record.billingServiceId, { servicePlanId: pkg.servicePlanId });
    }

    record = store.updateLease(record.leaseId, { packageName: pkg.name }, now);
    store.recordTicketForward(ticket.id, record.recurringChargeId ?? `lease:${record.leaseId}`, 'upgrade');
    store.logEvent('ticket_upgrade', {
      ticketId: ticket.id,
      leaseId: record.leaseId,
      from: lease.packageName,
      to: pkg.name,
    });
    this.logger.info(
      { ticketId: ticket.id, leaseId: record.leaseId, from: lease.packageName, to: pkg.name },
      'Package upgraded from ticket'
    );
  }

  private async forwardSupport(ticket: PmMaintenanceTicket): Promise<void> {
    const { billing, config, endpoints, store } = this.deps;

    const unit = resolveTicketUnit(ticket, this.logger);
    const lease = unit ? this.findLeaseForUnit(unit) : null;

    const property = lease?.propertyAddress ?? config.propertyManagement.defaultPropertyAddress;
    const endpoint = unit && property ? endpoints.findEndpoint(property, unit) : null;
    const deviceId = endpoint?.deviceId || undefined;

    const clientId = lease?.billingClientId ?? (await this.resolveTicketClient());
    const outboundId = await billing.createTicket(
      clientId,
      forwardedSubject(unit, ticket.subject),
      forwardedMessage(ticket, unit),
      deviceId
    );

    store.recordTicketForward(ticket.id, outboundId, 'support');
    store.logEvent('ticket_forwarded', { ticketId: ticket.id, outboundTicketId: outboundId, unit });
    this.logger.info({ ticketId: ticket.id, outboundTicketId: outboundId, unit }, 'Ticket forwarded');
  }

  /**
   * Active lease for a unit number. Ambiguous across properties is an error.
   */
  private findLeaseForUnit(unit: string): LeaseRecord | null {
    const matches = this.deps.store.listLeases('active').filter((l) => l.unitId === unit);
    if (matches.length > 1) {
      throw new DataResolutionError(
        `Unit ${unit} matches active leases at ${matches.length} properties`,
        'unit'
      );
    }
    return matches[0] ?? null;
  }

  private async resolveTicketClient(): Promise<string> {
    if (this.ticketClientId) {
      return this.ticketClientId;
    }

    this.ticketClientId = await findOrCreateCompanyClient(this.deps.billing, this.deps.config.uisp.ticketClientName, {
      note: 'Client for forwarded internet support tickets',
    });
    return this.ticketClientId;
  }
}
