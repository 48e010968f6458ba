export { Address, formatAddressList } from './address';
export { Message, type MessageDependencies } from './message';
export {
  type AttachmentPart,
  type ContentType,
  compileBody,
  compileHeaders,
  generateBoundary,
  type MessageFields,
  wrapBase64,
} from './mimeCompiler';
