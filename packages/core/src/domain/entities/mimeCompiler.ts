import { createHash, randomBytes } from 'node:crypto';
import { InvalidHeaderError } from '../errors';
import type { FileSystem } from '../repositories/fileSystem';
import type { Address } from './address';
import { formatAddressList, quote } from './address';

const CRLF = '\r\n';
const BASE64_LINE_LENGTH = 76;

const DEFAULT_CONTENT_TYPE = 'text/plain';
const DEFAULT_CHARSET = 'iso-8859-1';

export interface ContentType {
  type: string;
  charset: string;
}

/**
 * Snapshot of everything a message compiles from
 */
export interface MessageFields {
  body: string;
  from?: Address;
  sender?: Address;
  replyTo?: Address;
  cc: readonly Address[];
  bcc: readonly Address[];
  /** Lines already formatted as `name: value` */
  customHeaders: readonly string[];
  contentType?: ContentType;
  attachments: readonly string[];
}

export interface AttachmentPart {
  filename: string;
  mimeType: string;
  content: Buffer;
}

/**
 * Generate a boundary token for multipart bodies.
 *
 * 32 hex characters derived from the clock and fresh random bytes, so two
 * calls never share a token and the token never shows up in base64 data.
 */
export function generateBoundary(): string {
  return createHash('md5')
    .update(`${Date.now()}`)
    .update(randomBytes(16))
    .digest('hex');
}

/**
 * Base64-encode bytes and wrap them in CRLF-terminated lines of 76 characters
 */
export function wrapBase64(content: Buffer): string {
  const encoded = content.toString('base64');
  let wrapped = '';
  for (let i = 0; i < encoded.length; i += BASE64_LINE_LENGTH) {
    wrapped += encoded.slice(i, i + BASE64_LINE_LENGTH) + CRLF;
  }
  return wrapped;
}

/**
 * Compile the header lines of a message.
 *
 * MIME headers come first (multipart when there are attachments, the
 * explicit content type otherwise), then the address headers, then custom
 * headers in insertion order. A plain message without a content type gets
 * no MIME headers at all.
 */
export function compileHeaders(
  fields: MessageFields,
  boundary: string,
): string[] {
  const headers: string[] = [];

  if (fields.attachments.length > 0) {
    headers.push('MIME-Version: 1.0');
    headers.push(`Content-Type: multipart/mixed; boundary="${boundary}"`);
    headers.push('Content-Transfer-Encoding: 7bit');
    headers.push('This is a MIME encoded message');
  } else if (fields.contentType) {
    headers.push('MIME-Version: 1.0');
    headers.push(
      `Content-type:${fields.contentType.type}; charset="${fields.contentType.charset}"`,
    );
  }

  if (fields.from) {
    headers.push(`From: ${fields.from.render()}`);
  }
  if (fields.sender) {
    headers.push(`Sender: ${fields.sender.render()}`);
  }
  if (fields.replyTo) {
    headers.push(`Reply-To: ${fields.replyTo.render()}`);
  }
  if (fields.cc.length > 0) {
    headers.push(`Cc: ${formatAddressList(fields.cc)}`);
  }
  if (fields.bcc.length > 0) {
    headers.push(`Bcc: ${formatAddressList(fields.bcc)}`);
  }

  return [...headers, ...fields.customHeaders];
}

/**
 * Compile the message body.
 *
 * Without attachments the text is returned untouched. With attachments the
 * result is a multipart/mixed body: the text part first, then one base64
 * part per attachment, closed by the terminating boundary.
 */
export function compileBody(
  fields: MessageFields,
  attachments: readonly AttachmentPart[],
  boundary: string,
): string {
  if (attachments.length === 0) {
    return fields.body;
  }

  const contentType = fields.contentType?.type ?? DEFAULT_CONTENT_TYPE;
  const charset = fields.contentType?.charset ?? DEFAULT_CHARSET;

  const lines: string[] = [
    `--${boundary}`,
    `Content-Type: ${contentType}; charset="${charset}"`,
    'Content-Transfer-Encoding: 8bit',
    '',
    fields.body,
  ];

  for (const attachment of attachments) {
    lines.push(
      `--${boundary}`,
      `Content-Type: ${attachment.mimeType}; name=${quote(attachment.filename)}`,
      'Content-Transfer-Encoding: base64',
      'Content-Disposition: attachment',
      '',
      wrapBase64(attachment.content),
    );
  }

  lines.push(`--${boundary}--`);
  return lines.join(CRLF);
}

/**
 * Read attachment files through the file system port.
 * Names and types end up in part headers, so line breaks are rejected.
 */
export function readAttachments(
  paths: readonly string[],
  fileSystem: FileSystem,
): AttachmentPart[] {
  return paths.map((path) => {
    const filename = fileSystem.basename(path);
    const mimeType = fileSystem.mimeType(path);
    for (const [field, value] of [
      ['attachment name', filename],
      ['attachment type', mimeType],
    ]) {
      if (/[\r\n]/.test(value)) {
        throw new InvalidHeaderError(
          field,
          `must not contain line breaks: ${JSON.stringify(value)}`,
        );
      }
    }
    return { filename, mimeType, content: fileSystem.readBytes(path) };
  });
}

export function joinHeaders(headers: readonly string[]): string {
  return headers.join(CRLF);
}
