/**
 * Tenant notification capability. Optional: the engine receives null when
 * email is not configured and treats every notification as a no-op.
 *
 * @module packages/core/ports/INotifier
 */

import type { ServicePackage } from '../../../types/index.js';
import type { PmTenant } from './IPropertyManagementClient.js';

export interface WelcomeNotice {
  tenant: PmTenant;
  unitId: string;
  startDate: string | null;
  servicePackage: ServicePackage;
  upgradeOptions: ServicePackage[];
}

export interface SuspensionNotice {
  tenant: PmTenant;
  unitId: string;
  balance: number;
}

export interface INotifier {
  sendWelcome(notice: WelcomeNotice): Promise<void>;
  sendSuspensionNotice(notice: SuspensionNotice): Promise<void>;
}
