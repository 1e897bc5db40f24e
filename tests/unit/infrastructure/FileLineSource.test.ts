import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileLineSource } from '../../../src/infrastructure/sources/FileLineSource.js';

const TEST_DIR = join(tmpdir(), 'sor-reader-test-filelinesource');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

function readAll(source: FileLineSource): string[] {
  const lines: string[] = [];
  for (let line = source.readLine(); line !== null; line = source.readLine()) {
    lines.push(line.text);
  }
  return lines;
}

describe('FileLineSource', () => {
  describe('readLine()', () => {
    it('should read lines with their byte lengths', () => {
      const source = new FileLineSource(writeTempFile('basic.sor', '<1><abc>\n<2>\n'));

      expect(source.readLine()).toEqual({ text: '<1><abc>', byteLength: 9 });
      expect(source.readLine()).toEqual({ text: '<2>', byteLength: 4 });
      expect(source.readLine()).toBeNull();
      source.close();
    });

    it('should join lines that span several chunks', () => {
      const content = '<1><abcdefgh>\n<22><x>\n<333>';
      const source = new FileLineSource(writeTempFile('chunks.sor', content), { highWaterMark: 4 });

      expect(readAll(source)).toEqual(['<1><abcdefgh>', '<22><x>', '<333>']);
      source.close();
    });

    it('should decode multi-byte characters split across chunks', () => {
      const source = new FileLineSource(writeTempFile('utf8.sor', '<é>\n<ü>\n'), { highWaterMark: 2 });

      expect(source.readLine()).toEqual({ text: '<é>', byteLength: 5 });
      expect(source.readLine()).toEqual({ text: '<ü>', byteLength: 5 });
      source.close();
    });

    it('should return a final line without a terminator', () => {
      const source = new FileLineSource(writeTempFile('no-eol.sor', 'a\nbc'));
      expect(source.readLine()).toEqual({ text: 'a', byteLength: 2 });
      expect(source.readLine()).toEqual({ text: 'bc', byteLength: 2 });
      expect(source.readLine()).toBeNull();
      source.close();
    });

    it('should return null for an empty file', () => {
      const source = new FileLineSource(writeTempFile('empty.sor', ''));
      expect(source.readLine()).toBeNull();
      source.close();
    });
  });

  describe('seek()', () => {
    it('should read from an absolute byte offset', () => {
      const source = new FileLineSource(writeTempFile('seek.sor', '<1><abc>\n<2>\n'), { highWaterMark: 4 });

      source.readLine();
      source.seek(3);
      expect(source.readLine()).toEqual({ text: '<abc>', byteLength: 6 });
      source.seek(0);
      expect(source.readLine()?.text).toBe('<1><abc>');
      source.close();
    });

    it('should return null past the end of the file', () => {
      const source = new FileLineSource(writeTempFile('seek-past.sor', '<1>\n'));
      source.seek(50);
      expect(source.readLine()).toBeNull();
      source.close();
    });
  });

  describe('metadata()', () => {
    it('should return file name and size', () => {
      const content = '<1>\n<2>\n';
      const source = new FileLineSource(writeTempFile('meta.sor', content));
      expect(source.metadata()).toEqual({ fileName: 'meta.sor', fileSize: Buffer.byteLength(content) });
      source.close();
    });
  });

  describe('close()', () => {
    it('should be idempotent', () => {
      const source = new FileLineSource(writeTempFile('close.sor', '<1>\n'));
      source.close();
      expect(() => source.close()).not.toThrow();
    });

    it('should reject reads after close', () => {
      const source = new FileLineSource(writeTempFile('closed.sor', '<1>\n'));
      source.close();
      expect(() => source.readLine()).toThrow('has already been closed');
    });
  });

  it('should throw when the file does not exist', () => {
    expect(() => new FileLineSource(join(TEST_DIR, 'missing.sor'))).toThrow(/ENOENT/);
  });
});
