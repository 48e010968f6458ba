import {
  AttachmentNotFoundError,
  InvalidHeaderError,
  NoRecipientsError,
  SendFailedError,
} from '../errors';
import type { FileSystem } from '../repositories/fileSystem';
import type {
  MailTransport,
  TransportMessage,
} from '../repositories/mailTransport';
import type { Address } from './address';
import { formatAddressList } from './address';
import type { ContentType, MessageFields } from './mimeCompiler';
import {
  compileBody,
  compileHeaders,
  generateBoundary,
  joinHeaders,
  readAttachments,
} from './mimeCompiler';

const LINE_BREAK = /[\r\n]/;
const HEADER_NAME = /^[!-9;-~]+$/;

export interface MessageDependencies {
  transport: MailTransport;
  fileSystem: FileSystem;
  /** Source of multipart boundary tokens, called once per compile */
  boundary?: () => string;
}

function assertSingleLine(field: string, value: string): void {
  if (LINE_BREAK.test(value)) {
    throw new InvalidHeaderError(
      field,
      `must not contain line breaks: ${JSON.stringify(value)}`,
    );
  }
}

/**
 * Email message builder.
 *
 * Collects recipients, headers, content type and attachment paths, then
 * compiles them into a MIME payload and hands it to the transport.
 *
 * @example
 * ```typescript
 * const message = new Message('Report', 'See attached.', { transport, fileSystem });
 * message.addTo(new Address('jane@example.com', 'Jane'));
 * message.addAttachment('/tmp/report.pdf');
 * await message.send();
 * ```
 */
export class Message {
  private readonly to: Address[] = [];
  private from?: Address;
  private sender?: Address;
  private replyTo?: Address;
  private readonly cc: Address[] = [];
  private readonly bcc: Address[] = [];
  private readonly customHeaders: string[] = [];
  private contentType?: ContentType;
  private readonly attachments: string[] = [];

  private readonly transport: MailTransport;
  private readonly fileSystem: FileSystem;
  private readonly nextBoundary: () => string;

  constructor(
    private readonly subject: string,
    private readonly body: string,
    dependencies: MessageDependencies,
  ) {
    assertSingleLine('subject', subject);
    this.transport = dependencies.transport;
    this.fileSystem = dependencies.fileSystem;
    this.nextBoundary = dependencies.boundary ?? generateBoundary;
  }

  addTo(address: Address): void {
    this.to.push(address);
  }

  setFrom(address: Address): void {
    this.from = address;
  }

  /**
   * Set the submitter, for agents sending on behalf of someone else
   */
  setSender(address: Address): void {
    this.sender = address;
  }

  setReplyTo(address: Address): void {
    this.replyTo = address;
  }

  addCC(address: Address): void {
    this.cc.push(address);
  }

  /**
   * Add a recipient hidden from the others
   */
  addBCC(address: Address): void {
    this.bcc.push(address);
  }

  /**
   * Override the default text/plain; iso-8859-1 body type
   */
  setContentType(type: string, charset: string): void {
    assertSingleLine('content type', type);
    assertSingleLine('charset', charset);
    if (charset.includes('"')) {
      throw new InvalidHeaderError(
        'charset',
        `must not contain quotes: ${JSON.stringify(charset)}`,
      );
    }
    this.contentType = { type, charset };
  }

  /**
   * Append a header line verbatim after the standard headers.
   * Collisions with standard headers are not detected.
   */
  addCustomHeader(name: string, value: string): void {
    if (!HEADER_NAME.test(name)) {
      throw new InvalidHeaderError(
        'header name',
        `must be printable ASCII without colons or spaces: ${JSON.stringify(name)}`,
      );
    }
    assertSingleLine(`${name} header`, value);
    this.customHeaders.push(`${name}: ${value}`);
  }

  /**
   * Attach a file. Only the path is kept; the file is read when the message
   * is compiled.
   *
   * @throws {AttachmentNotFoundError} If no file exists at `path`
   * @throws {InvalidHeaderError} If the file name contains line breaks
   */
  addAttachment(path: string): void {
    if (!this.fileSystem.exists(path)) {
      throw new AttachmentNotFoundError(path);
    }
    assertSingleLine('attachment name', this.fileSystem.basename(path));
    this.attachments.push(path);
  }

  /**
   * Compile headers and body from the current state.
   *
   * @throws {NoRecipientsError} If no To address was added
   */
  compile(boundary: string): TransportMessage {
    if (this.to.length === 0) {
      throw new NoRecipientsError();
    }

    const fields = this.fields();
    const attachments = readAttachments(this.attachments, this.fileSystem);

    return {
      recipients: formatAddressList(this.to),
      subject: this.subject,
      body: compileBody(fields, attachments, boundary),
      headers: joinHeaders(compileHeaders(fields, boundary)),
    };
  }

  /**
   * Compile the message with a fresh boundary and deliver it.
   *
   * @throws {NoRecipientsError} If no To address was added
   * @throws {SendFailedError} If the transport rejects the message or fails
   */
  async send(): Promise<void> {
    const message = this.compile(this.nextBoundary());

    let accepted: boolean;
    try {
      accepted = await this.transport.send(message);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SendFailedError(reason, { cause: error });
    }

    if (!accepted) {
      throw new SendFailedError();
    }
  }

  private fields(): MessageFields {
    return {
      body: this.body,
      from: this.from,
      sender: this.sender,
      replyTo: this.replyTo,
      cc: this.cc,
      bcc: this.bcc,
      customHeaders: this.customHeaders,
      contentType: this.contentType,
      attachments: this.attachments,
    };
  }
}
