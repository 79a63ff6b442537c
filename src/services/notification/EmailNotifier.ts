/**
 * EmailNotifier - tenant notifications over SMTP
 *
 * Only constructed when the `email` config section is present; otherwise the
 * engine is handed null. Tenants without an email address are skipped.
 *
 * @module services/notification/EmailNotifier
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { Logger } from 'pino';
import type { AppConfig } from '../../config.js';
import type { INotifier, WelcomeNotice, SuspensionNotice } from '../../packages/core/ports/index.js';
import type { ServicePackage } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';

export type EmailConfig = NonNullable<AppConfig['email']>;

export interface OutgoingEmail {
  to: string;
  subject: string;
  html: string;
}

/** Minimal sending surface, so tests can pass a fake transport */
export interface MailTransport {
  sendMail(message: OutgoingEmail & { from: string }): Promise<unknown>;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function formatSpeed(pkg: ServicePackage): string {
  return pkg.downloadMbps >= 1000 && pkg.downloadMbps % 1000 === 0
    ? `${pkg.downloadMbps / 1000} Gbps`
    : `${pkg.downloadMbps} Mbps`;
}

export function welcomeEmail(notice: WelcomeNotice): string {
  const name = escapeHtml(notice.tenant.firstName || 'there');
  const start = notice.startDate ? ` starting <strong>${escapeHtml(notice.startDate)}</strong>` : '';
  const rows = notice.upgradeOptions
    .map(
      (pkg) =>
        `<tr><td>${escapeHtml(pkg.name)}</td><td>${formatSpeed(pkg)}</td><td>+$${pkg.addonPrice.toFixed(2)}/mo</td></tr>`
    )
    .join('');
  const upgrades =
    notice.upgradeOptions.length > 0
      ? `
      <h3>Want Faster Speeds?</h3>
      <p>Submit a maintenance request with subject "Internet Upgrade" and the package you want:</p>
      <table><tr><th>Package</th><th>Speed</th><th>Add-on</th></tr>${rows}</table>`
      : '';

  return `
    <div style="font-family:sans-serif;max-width:600px">
      <h2 style="color:#1d4ed8">Your Internet Service Is Active</h2>
      <p>Hi ${name},</p>
      <p>Internet service for <strong>Unit ${escapeHtml(notice.unitId)}</strong> is active${start}.</p>
      <h3>Your Current Plan</h3>
      <p><strong>${escapeHtml(notice.servicePackage.name)}</strong> (${formatSpeed(notice.servicePackage)}) - included with rent</p>${upgrades}
      <h3>Need Help?</h3>
      <p>Internet issues? Submit a maintenance request with "Internet" in the subject.</p>
    </div>
  `;
}

export function suspensionEmail(notice: SuspensionNotice): string {
  const name = escapeHtml(notice.tenant.firstName || 'there');
  return `
    <div style="font-family:sans-serif;max-width:600px">
      <h2 style="color:#dc2626">Internet Service Suspended</h2>
      <p>Hi ${name},</p>
      <p>Internet service for <strong>Unit ${escapeHtml(notice.unitId)}</strong> has been suspended because your account has an outstanding balance of <strong>$${notice.balance.toFixed(2)}</strong>.</p>
      <p>Service is restored automatically once the balance is paid.</p>
    </div>
  `;
}

export class EmailNotifier implements INotifier {
  private readonly transport: MailTransport;
  private readonly from: string;
  private readonly logger: Logger;

  constructor(config: EmailConfig, logger?: Logger, transport?: MailTransport) {
    this.logger = logger ?? createChildLogger({ component: 'EmailNotifier' });
    this.from = config.from;
    this.transport = transport ?? EmailNotifier.createTransport(config);
  }

  private static createTransport(config: EmailConfig): Transporter {
    return nodemailer.createTransport({
      host: config.smtpHost,
      port: config.smtpPort,
      secure: config.secure,
      auth: config.user ? { user: config.user, pass: config.pass } : undefined,
    });
  }

  async sendWelcome(notice: WelcomeNotice): Promise<void> {
    await this.send(notice.tenant.email, 'Your internet service is active', welcomeEmail(notice), {
      tenantId: notice.tenant.id,
      unitId: notice.unitId,
    });
  }

  async sendSuspensionNotice(notice: SuspensionNotice): Promise<void> {
    await this.send(notice.tenant.email, 'Internet service suspended', suspensionEmail(notice), {
      tenantId: notice.tenant.id,
      unitId: notice.unitId,
    });
  }

  private async send(
    to: string | null,
    subject: string,
    html: string,
    context: Record<string, unknown>
  ): Promise<void> {
    if (!to) {
      this.logger.debug(context, 'Tenant has no email address, skipping notification');
      return;
    }
    await this.transport.sendMail({ from: this.from, to, subject, html });
    this.logger.info({ ...context, subject }, 'Notification sent');
  }
}
