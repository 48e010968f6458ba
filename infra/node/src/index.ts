export * from '@mailforge/core';
export {
  loadTransportConfig,
  type SmtpConfig,
  type TransportConfig,
  type TransportKind,
} from './config';
export * from './infrastructure';
export { createMailer, type Mailer, type MailerOptions } from './mailer';
