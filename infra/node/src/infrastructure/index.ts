export { NodeFileSystem } from './nodeFileSystem';
export {
  createTransporter,
  type Envelope,
  extractAddresses,
  NodemailerTransport,
  type RawMailSender,
} from './nodemailerTransport';
