import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { NodeFileSystem } from '@/infrastructure/nodeFileSystem';

describe('NodeFileSystem', () => {
  const fileSystem = new NodeFileSystem();
  const reportBytes = Buffer.from([0x25, 0x50, 0x44, 0x46, 0x00, 0xff]);
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'mailforge-fs-'));
    writeFileSync(join(dir, 'report.pdf'), reportBytes);
    writeFileSync(join(dir, 'notes.txt'), 'notes');
    writeFileSync(join(dir, 'data.unknownext'), 'data');
    writeFileSync(join(dir, 'pdf'), 'no extension');
    writeFileSync(join(dir, '.html'), 'dotfile');
    mkdirSync(join(dir, 'folder.pdf'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('exists', () => {
    it('returns true for a regular file', () => {
      expect(fileSystem.exists(join(dir, 'report.pdf'))).toBe(true);
    });

    it('returns false for a missing path', () => {
      expect(fileSystem.exists(join(dir, 'missing.pdf'))).toBe(false);
    });

    it('returns false for a directory', () => {
      expect(fileSystem.exists(join(dir, 'folder.pdf'))).toBe(false);
    });
  });

  it('reads file bytes', () => {
    expect(fileSystem.readBytes(join(dir, 'report.pdf'))).toEqual(reportBytes);
  });

  it('detects MIME types from the extension', () => {
    expect(fileSystem.mimeType(join(dir, 'report.pdf'))).toBe('application/pdf');
    expect(fileSystem.mimeType(join(dir, 'notes.txt'))).toBe('text/plain');
  });

  it('falls back to application/octet-stream for unknown extensions', () => {
    expect(fileSystem.mimeType(join(dir, 'data.unknownext'))).toBe(
      'application/octet-stream',
    );
  });

  it('does not guess a type from a file name without extension', () => {
    expect(fileSystem.mimeType(join(dir, 'pdf'))).toBe(
      'application/octet-stream',
    );
    expect(fileSystem.mimeType(join(dir, '.html'))).toBe(
      'application/octet-stream',
    );
  });

  it('returns the file name without directories', () => {
    expect(fileSystem.basename(join(dir, 'report.pdf'))).toBe('report.pdf');
  });
});
