/**
 * File access needed to attach files to a message.
 *
 * Reads are synchronous and happen only while a message is compiled.
 */
export interface FileSystem {
  /** Whether `path` points at an existing regular file */
  exists(path: string): boolean;
  readBytes(path: string): Buffer;
  /** MIME type used for the attachment's Content-Type */
  mimeType(path: string): string;
  /** File name announced to the recipient */
  basename(path: string): string;
}
