import type { MailTransport, TransportMessage } from '@mailforge/core';
import nodemailer from 'nodemailer';
import type { TransportConfig } from '../config';

const CRLF = '\r\n';

export interface Envelope {
  from?: string;
  to: string[];
}

/**
 * The part of a nodemailer transporter this transport relies on
 */
export interface RawMailSender {
  sendMail(mail: { envelope: Envelope; raw: string }): Promise<unknown>;
}

/**
 * Create a nodemailer transporter for the configured transport kind
 */
export function createTransporter(config: TransportConfig): RawMailSender {
  switch (config.kind) {
    case 'sendmail':
      return nodemailer.createTransport({
        sendmail: true,
        path: config.sendmailPath,
        newline: 'unix',
      });
    case 'smtp':
      return nodemailer.createTransport({
        host: config.smtp.host,
        port: config.smtp.port,
        secure: config.smtp.secure,
        auth: config.smtp.auth,
      });
    case 'stream':
      return nodemailer.createTransport({
        streamTransport: true,
        buffer: true,
      });
  }
}

function isHeader(line: string, name: string): boolean {
  return line.toLowerCase().startsWith(`${name.toLowerCase()}:`);
}

function headerValues(lines: readonly string[], name: string): string[] {
  return lines
    .filter((line) => isHeader(line, name))
    .map((line) => line.slice(name.length + 1).trim());
}

/**
 * Extract bare email addresses from a rendered address list.
 *
 * Commas inside quoted display names do not split the list.
 */
export function extractAddresses(list: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < list.length; i++) {
    const char = list.charAt(i);
    if (quoted && char === '\\') {
      current += char + list.charAt(i + 1);
      i++;
      continue;
    }
    if (char === '"') {
      quoted = !quoted;
    }
    if (char === ',' && !quoted) {
      tokens.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  tokens.push(current);

  return tokens
    .map((token) => (/<([^<>]*)>\s*$/.exec(token)?.[1] ?? token).trim())
    .filter((address) => address !== '');
}

function rejectedRecipients(info: unknown): string[] {
  if (
    typeof info !== 'object' ||
    info === null ||
    !('rejected' in info) ||
    !Array.isArray(info.rejected)
  ) {
    return [];
  }
  return info.rejected.map((entry) => String(entry));
}

/**
 * MailTransport implementation on top of nodemailer.
 *
 * Builds a raw message from the compiled parts (Bcc lines are kept out of
 * the raw message and only used for the envelope, header lines without a
 * field name are moved ahead of the first boundary) and hands it to the
 * configured nodemailer transporter.
 */
export class NodemailerTransport implements MailTransport {
  private readonly sender: RawMailSender;
  private readonly defaultSender?: string;

  /**
   * @param options.config - Transport configuration (defaults to local sendmail)
   * @param options.transporter - Optional transporter instance, used instead of one built from `config`
   */
  constructor(
    options: { config?: TransportConfig; transporter?: RawMailSender } = {},
  ) {
    const config: TransportConfig = options.config ?? {
      kind: 'sendmail',
      sendmailPath: 'sendmail',
    };
    this.sender = options.transporter ?? createTransporter(config);
    this.defaultSender = config.defaultSender;
  }

  /**
   * Send a compiled message.
   *
   * @returns `false` if the mail agent rejected any recipient
   * @throws {Error} If nodemailer fails to deliver the message
   */
  async send(message: TransportMessage): Promise<boolean> {
    const headers = message.headers === '' ? [] : message.headers.split(CRLF);
    const envelope = this.buildEnvelope(message.recipients, headers);

    // Lines without a field name (the multipart notice) go to the preamble
    const fields = headers.filter((line) => line.includes(':'));
    const preamble = headers.filter((line) => !line.includes(':'));

    const raw = [
      `To: ${message.recipients}`,
      `Subject: ${message.subject}`,
      ...fields.filter((line) => !isHeader(line, 'Bcc')),
      '',
      ...preamble,
      message.body,
    ].join(CRLF);

    let info: unknown;
    try {
      info = await this.sender.sendMail({ envelope, raw });
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to send message via nodemailer: ${errorMessage}`);
    }

    const rejected = rejectedRecipients(info);
    if (rejected.length > 0) {
      console.error(
        `[Mail Transport] Recipients rejected: ${rejected.join(', ')}`,
      );
      return false;
    }
    return true;
  }

  /**
   * Envelope recipients are the To list plus every Cc and Bcc address.
   * The envelope sender is the configured default, else Sender, else From.
   */
  private buildEnvelope(recipients: string, headers: string[]): Envelope {
    const to = [
      recipients,
      ...headerValues(headers, 'Cc'),
      ...headerValues(headers, 'Bcc'),
    ].flatMap(extractAddresses);

    const from =
      this.defaultSender ??
      [...headerValues(headers, 'Sender'), ...headerValues(headers, 'From')]
        .flatMap(extractAddresses)
        .at(0);

    return { from, to };
  }
}
