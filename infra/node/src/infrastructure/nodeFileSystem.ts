import { readFileSync, statSync } from 'node:fs';
import { basename, extname } from 'node:path';
import type { FileSystem } from '@mailforge/core';
import mimeTypes from 'nodemailer/lib/mime-funcs/mime-types';

/**
 * FileSystem backed by `node:fs`.
 *
 * MIME types come from nodemailer's extension table. Files without an
 * extension, and unknown extensions, are `application/octet-stream`.
 */
export class NodeFileSystem implements FileSystem {
  exists(path: string): boolean {
    return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
  }

  readBytes(path: string): Buffer {
    return readFileSync(path);
  }

  mimeType(path: string): string {
    // nodemailer falls back to the bare file name when there is no extension
    if (extname(path) === '') {
      return 'application/octet-stream';
    }
    return mimeTypes.detectMimeType(path);
  }

  basename(path: string): string {
    return basename(path);
  }
}
