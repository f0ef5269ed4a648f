import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ExitCode } from '../src/errors.js';
import { main } from '../src/program.js';
import { createTestCli, makeTempDir, removeTempDirs, writeScript } from './helpers.js';

const unreadable = vi.hoisted(() => ({ paths: new Set<string>() }));

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return {
    ...actual,
    readFileSync: (...args: Parameters<typeof actual.readFileSync>) => {
      const [file] = args;
      if (typeof file === 'string' && unreadable.paths.has(file)) {
        throw Object.assign(new Error(`EACCES: permission denied, open '${file}'`), {
          code: 'EACCES',
        });
      }
      return actual.readFileSync(...args);
    },
  };
});

describe('unreadable .env files', () => {
  afterEach(() => {
    unreadable.paths.clear();
    removeTempDirs();
  });

  it('skips an unreadable .env and keeps searching upward', () => {
    const root = makeTempDir();
    const nested = path.join(root, 'project');
    fs.mkdirSync(nested);
    fs.writeFileSync(path.join(root, '.env'), 'LUMEN_LOG_LEVEL=error\n');
    fs.writeFileSync(path.join(nested, '.env'), 'LUMEN_LOG_LEVEL=debug\n');
    unreadable.paths.add(path.join(nested, '.env'));

    expect(loadConfig(nested, {})).toEqual({ logLevel: 'error' });
  });

  it('still scans the script', async () => {
    const cli = createTestCli();
    const envPath = path.join(cli.ctx.cwd, '.env');
    fs.writeFileSync(envPath, 'LUMEN_ENV=production\n');
    unreadable.paths.add(envPath);
    const script = writeScript(cli.ctx.cwd, 'ok.lum', 'true');

    const code = await main(['--no-color', script], cli.ctx);

    expect(code).toBe(ExitCode.OK);
    expect(cli.stdout.text()).toBe('TRUE true null\nEOF  null\n');
    expect(cli.stderr.text()).toBe('');
  });
});
