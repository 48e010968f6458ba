import { Address, formatAddressList } from '../../domain/entities/address';
import { Message } from '../../domain/entities/message';
import { NoRecipientsError } from '../../domain/errors';
import type { FileSystem } from '../../domain/repositories/fileSystem';
import type { MailTransport } from '../../domain/repositories/mailTransport';

/**
 * Plain address data, as carried by callers that do not build `Address` values
 */
export interface EmailAddress {
  name?: string;
  address: string;
}

/**
 * Input data for sending a message
 */
export interface SendMessageInput {
  subject: string;
  body: string;
  to: EmailAddress[];
  cc?: EmailAddress[];
  bcc?: EmailAddress[];
  from?: EmailAddress;
  sender?: EmailAddress;
  replyTo?: EmailAddress;
  contentType?: {
    type: string;
    charset: string;
  };
  headers?: { name: string; value: string }[];
  /** Paths of files to attach */
  attachments?: string[];
}

/**
 * Output data after sending a message
 */
export interface SendMessageOutput {
  /** Rendered To list the transport received */
  recipients: string;
  attachmentCount: number;
}

export interface SendMessageUseCaseOptions {
  boundary?: () => string;
}

function toAddress(input: EmailAddress): Address {
  return new Address(input.address, input.name);
}

/**
 * Use case for sending a message described as plain data
 */
export class SendMessageUseCase {
  constructor(
    private readonly transport: MailTransport,
    private readonly fileSystem: FileSystem,
    private readonly options: SendMessageUseCaseOptions = {},
  ) {}

  /**
   * Execute the send message use case
   *
   * @throws {NoRecipientsError} If `to` is empty
   * @throws {InvalidHeaderError} If an address or header would break its line
   * @throws {AttachmentNotFoundError} If an attachment path does not exist
   * @throws {SendFailedError} If the transport fails
   */
  async execute(input: SendMessageInput): Promise<SendMessageOutput> {
    if (input.to.length === 0) {
      throw new NoRecipientsError();
    }

    const to = input.to.map(toAddress);
    const message = new Message(input.subject, input.body, {
      transport: this.transport,
      fileSystem: this.fileSystem,
      boundary: this.options.boundary,
    });

    for (const address of to) {
      message.addTo(address);
    }
    if (input.from) {
      message.setFrom(toAddress(input.from));
    }
    if (input.sender) {
      message.setSender(toAddress(input.sender));
    }
    if (input.replyTo) {
      message.setReplyTo(toAddress(input.replyTo));
    }
    for (const address of input.cc ?? []) {
      message.addCC(toAddress(address));
    }
    for (const address of input.bcc ?? []) {
      message.addBCC(toAddress(address));
    }
    if (input.contentType) {
      message.setContentType(input.contentType.type, input.contentType.charset);
    }
    for (const header of input.headers ?? []) {
      message.addCustomHeader(header.name, header.value);
    }
    for (const path of input.attachments ?? []) {
      message.addAttachment(path);
    }

    await message.send();

    return {
      recipients: formatAddressList(to),
      attachmentCount: input.attachments?.length ?? 0,
    };
  }
}
