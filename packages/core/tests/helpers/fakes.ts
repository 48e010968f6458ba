import { vi } from 'vitest';
import type {
  FileSystem,
  MailTransport,
  TransportMessage,
} from '@/domain/repositories';

export interface FakeFile {
  content: Buffer;
  mimeType: string;
}

/**
 * In-memory file system keyed by path
 */
export class MemoryFileSystem implements FileSystem {
  readonly files = new Map<string, FakeFile>();

  constructor(files: Record<string, FakeFile> = {}) {
    for (const [path, file] of Object.entries(files)) {
      this.files.set(path, file);
    }
  }

  exists(path: string): boolean {
    return this.files.has(path);
  }

  readBytes(path: string): Buffer {
    return this.get(path).content;
  }

  mimeType(path: string): string {
    return this.get(path).mimeType;
  }

  basename(path: string): string {
    return path.slice(path.lastIndexOf('/') + 1);
  }

  private get(path: string): FakeFile {
    const file = this.files.get(path);
    if (!file) {
      throw new Error(`ENOENT: ${path}`);
    }
    return file;
  }
}

/**
 * Transport that records every message and answers with `result`
 */
export function createRecordingTransport(result = true) {
  const sent: TransportMessage[] = [];
  const send = vi.fn(async (message: TransportMessage) => {
    sent.push(message);
    return result;
  });
  return { sent, send } satisfies MailTransport & {
    sent: TransportMessage[];
  };
}

/**
 * Boundary generator returning `boundary-1`, `boundary-2`, ...
 */
export function sequentialBoundary(): () => string {
  let count = 0;
  return () => {
    count += 1;
    return `boundary-${count}`;
  };
}
