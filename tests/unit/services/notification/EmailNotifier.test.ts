/**
 * EmailNotifier Tests
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
  EmailNotifier,
  suspensionEmail,
  welcomeEmail,
  type MailTransport,
} from '../../../../src/services/notification/EmailNotifier.js';
import { silentLogger, tenant, testConfig } from '../../../helpers/fakes.js';

const config = testConfig();
const [fiber500, fiber1g, fiber2g] = config.packages;

describe('EmailNotifier', () => {
  let sendMail: Mock<MailTransport['sendMail']>;
  let notifier: EmailNotifier;

  beforeEach(() => {
    sendMail = vi.fn<MailTransport['sendMail']>().mockResolvedValue({});
    notifier = new EmailNotifier(
      { smtpHost: 'smtp.test', smtpPort: 587, secure: false, from: 'noc@example.com' },
      silentLogger,
      { sendMail }
    );
  });

  it('sends the welcome email to the tenant', async () => {
    if (!fiber500) throw new Error('missing package');

    await notifier.sendWelcome({
      tenant: tenant('t-1'),
      unitId: '12',
      startDate: '2026-03-01',
      servicePackage: fiber500,
      upgradeOptions: [],
    });

    expect(sendMail).toHaveBeenCalledTimes(1);
    expect(sendMail).toHaveBeenCalledWith(
      expect.objectContaining({
        from: 'noc@example.com',
        to: 't-1@example.com',
        subject: 'Your internet service is active',
      })
    );
  });

  it('sends the suspension notice', async () => {
    await notifier.sendSuspensionNotice({ tenant: tenant('t-1'), unitId: '12', balance: 150 });

    expect(sendMail.mock.calls[0]?.[0].subject).toBe('Internet service suspended');
  });

  it('skips tenants without an email address', async () => {
    await notifier.sendSuspensionNotice({ tenant: tenant('t-1', { email: null }), unitId: '12', balance: 150 });

    expect(sendMail).not.toHaveBeenCalled();
  });

  it('propagates transport failures', async () => {
    sendMail.mockRejectedValueOnce(new Error('smtp down'));

    await expect(
      notifier.sendSuspensionNotice({ tenant: tenant('t-1'), unitId: '12', balance: 150 })
    ).rejects.toThrow('smtp down');
  });
});

describe('email bodies', () => {
  it('lists upgrade options with speed and price', () => {
    if (!fiber500 || !fiber1g || !fiber2g) throw new Error('missing package');

    const html = welcomeEmail({
      tenant: tenant('t-1'),
      unitId: '12',
      startDate: '2026-03-01',
      servicePackage: fiber500,
      upgradeOptions: [fiber1g, fiber2g],
    });

    expect(html).toContain('<strong>Unit 12</strong> is active starting <strong>2026-03-01</strong>');
    expect(html).toContain('<strong>Fiber 500</strong> (500 Mbps) - included with rent');
    expect(html).toContain('<tr><td>Fiber 1G</td><td>1 Gbps</td><td>+$10.00/mo</td></tr>');
    expect(html).toContain('<tr><td>Fiber 2G</td><td>2 Gbps</td><td>+$20.00/mo</td></tr>');
  });

  it('escapes tenant-supplied text', () => {
    const html = suspensionEmail({ tenant: tenant('t-1', { firstName: '<b>Sam</b>' }), unitId: '12', balance: 80 });

    expect(html).toContain('<p>Hi &lt;b&gt;Sam&lt;/b&gt;,</p>');
    expect(html).toContain('outstanding balance of <strong>$80.00</strong>');
  });
});
