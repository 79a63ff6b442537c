/**
 * Resolution of units and addresses from upstream records
 *
 * Structured fields are preferred. Free-text parsing is a fallback and every
 * use of it is logged so bad upstream data stays visible.
 */

import type { Logger } from 'pino';
import type { PmLease, PmMaintenanceTicket } from '../../packages/core/ports/index.js';
import { DataResolutionError } from '../../utils/errors.js';

const FIRST_INTEGER = /(\d+)/;
const UNIT_REFERENCE = /unit\s*#?\s*(\d+)/i;

/**
 * Unit identifier for a lease
 *
 * @throws DataResolutionError when neither the structured field nor the unit name yields one
 */
export function resolveLeaseUnit(lease: PmLease, logger: Logger): string {
  if (lease.unitNumber) {
    return lease.unitNumber;
  }

  const match = lease.unitName ? FIRST_INTEGER.exec(lease.unitName) : null;
  if (match?.[1]) {
    logger.warn(
      { leaseId: lease.id, unitName: lease.unitName, unit: match[1] },
      'Lease has no unit number; parsed it from the unit name'
    );
    return match[1];
  }

  throw new DataResolutionError(`Lease ${lease.id} has no resolvable unit number`, 'unit');
}

/**
 * Property address for a lease, falling back to the configured default
 *
 * @throws DataResolutionError when neither is available
 */
export function resolvePropertyAddress(lease: PmLease, defaultAddress: string | undefined): string {
  const address = lease.propertyAddress ?? defaultAddress;
  if (!address) {
    throw new DataResolutionError(`Lease ${lease.id} has no property address`, 'propertyAddress');
  }
  return address;
}

/**
 * Unit a maintenance ticket refers to, or null when it cannot be told
 */
export function resolveTicketUnit(ticket: PmMaintenanceTicket, logger: Logger): string | null {
  if (ticket.unitNumber) {
    return ticket.unitNumber;
  }

  const match = UNIT_REFERENCE.exec(`${ticket.subject} ${ticket.description}`);
  if (match?.[1]) {
    logger.warn(
      { ticketId: ticket.id, unit: match[1] },
      'Ticket has no unit number; parsed it from the ticket text'
    );
    return match[1];
  }

  return null;
}
