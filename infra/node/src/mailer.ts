import {
  type FileSystem,
  type MailTransport,
  Message,
  type SendMessageInput,
  type SendMessageOutput,
  SendMessageUseCase,
} from '@mailforge/core';
import { loadTransportConfig, type TransportConfig } from './config';
import { NodeFileSystem } from './infrastructure/nodeFileSystem';
import { NodemailerTransport } from './infrastructure/nodemailerTransport';

export interface Mailer {
  /** Start a message bound to this mailer's transport and file system */
  compose(subject: string, body: string): Message;
  sendMessage(input: SendMessageInput): Promise<SendMessageOutput>;
}

export interface MailerOptions {
  config?: TransportConfig;
  transport?: MailTransport;
  fileSystem?: FileSystem;
}

/**
 * Wire the Node.js file system and a nodemailer transport into messages.
 *
 * Without an explicit transport or config, the transport is configured from
 * environment variables (see `loadTransportConfig`).
 */
export function createMailer(options: MailerOptions = {}): Mailer {
  const fileSystem = options.fileSystem ?? new NodeFileSystem();
  const transport =
    options.transport ??
    new NodemailerTransport({
      config: options.config ?? loadTransportConfig(),
    });
  const useCase = new SendMessageUseCase(transport, fileSystem);

  return {
    compose: (subject, body) =>
      new Message(subject, body, { transport, fileSystem }),
    sendMessage: (input) => useCase.execute(input),
  };
}
