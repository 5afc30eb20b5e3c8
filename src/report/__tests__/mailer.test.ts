import { describe, it, expect, vi } from 'vitest';
import type { SendMailOptions } from 'nodemailer';
import { TransportError } from '../../errors';
import type { MailMessage } from '../../types';
import { SmtpMailSender, type MailTransport } from '../mailer';

const MESSAGE: MailMessage = {
  to: ['admins@example.com', 'helpdesk@example.com'],
  from: 'reports@example.com',
  subject: 'Mailbox Report - 2026-10-18',
  smtpHost: 'smtp.test',
};

function fakeTransport(sendMail: (options: SendMailOptions) => Promise<{ messageId: string }>) {
  const transport = { sendMail: vi.fn(sendMail), close: vi.fn() };
  const createTransport = vi.fn((_host: string, _port: number): MailTransport => transport);
  const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { transport, createTransport, logger };
}

describe('SmtpMailSender', () => {
  it('sends the report as an HTML message', async () => {
    const { transport, createTransport, logger } = fakeTransport(async () => ({
      messageId: '<1@smtp.test>',
    }));
    const sender = new SmtpMailSender({ createTransport, logger });

    const result = await sender.send(MESSAGE, '<p>report</p>');

    expect(result.messageId).toBe('<1@smtp.test>');
    expect(createTransport).toHaveBeenCalledWith('smtp.test', 25);
    expect(transport.sendMail).toHaveBeenCalledWith({
      from: 'reports@example.com',
      to: ['admins@example.com', 'helpdesk@example.com'],
      subject: 'Mailbox Report - 2026-10-18',
      html: '<p>report</p>',
    });
    expect(transport.close).toHaveBeenCalledTimes(1);
    expect(logger.log).toHaveBeenCalledWith(
      '[Mailer] Sending "Mailbox Report - 2026-10-18" from reports@example.com to admins@example.com, helpdesk@example.com via smtp.test:25'
    );
  });

  it('takes the port from the message, then the options', async () => {
    const { createTransport, logger } = fakeTransport(async () => ({ messageId: 'x' }));
    const sender = new SmtpMailSender({ port: 587, createTransport, logger });

    await sender.send(MESSAGE, '');
    await sender.send({ ...MESSAGE, smtpPort: 2525 }, '');

    expect(createTransport.mock.calls).toEqual([
      ['smtp.test', 587],
      ['smtp.test', 2525],
    ]);
  });

  it('wraps delivery failures in TransportError and still closes', async () => {
    const failure = new Error('connection refused');
    const { transport, createTransport, logger } = fakeTransport(async () => {
      throw failure;
    });
    const sender = new SmtpMailSender({ createTransport, logger });

    const err = await sender.send(MESSAGE, '').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toHaveProperty('message', 'Failed to send report via smtp.test:25: connection refused');
    expect(err).toHaveProperty('smtpHost', 'smtp.test');
    expect(err).toHaveProperty('cause', failure);
    expect(transport.close).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('[Mailer] Send error:', 'connection refused');
  });

  it('refuses a message without recipients', async () => {
    const { createTransport, logger } = fakeTransport(async () => ({ messageId: 'x' }));
    const sender = new SmtpMailSender({ createTransport, logger });

    await expect(sender.send({ ...MESSAGE, to: [] }, '')).rejects.toThrow('No recipients given');
    expect(createTransport).not.toHaveBeenCalled();
  });
});
