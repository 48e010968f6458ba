export type { FileSystem } from './fileSystem';
export type { MailTransport, TransportMessage } from './mailTransport';
