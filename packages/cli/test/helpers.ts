import { createMockLogger, type MockLogger } from '@lumen/logger/mock';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Readable, Writable } from 'node:stream';
import type { CliContext } from '../src/program.js';

export interface CapturedStream {
  stream: Writable;
  text(): string;
}

export function captureStream(): CapturedStream {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

export interface TestCli {
  ctx: CliContext;
  stdout: CapturedStream;
  stderr: CapturedStream;
  logger: MockLogger;
}

export function createTestCli(input: string[] = [], env: Record<string, string> = {}): TestCli {
  const stdout = captureStream();
  const stderr = captureStream();
  const logger = createMockLogger();

  return {
    ctx: {
      stdin: Readable.from(input),
      stdout: stdout.stream,
      stderr: stderr.stream,
      cwd: makeTempDir(),
      env,
      createLogger: () => logger,
    },
    stdout,
    stderr,
    logger,
  };
}

const tempDirs: string[] = [];

export function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lumen-test-'));
  tempDirs.push(dir);
  return dir;
}

/** Delete every directory made by makeTempDir so far */
export function removeTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export function writeScript(dir: string, name: string, content: string): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}
