/**
 * Tests for up, down, restart, logs and status
 */

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { init } from '../init.js';
import { up } from '../up.js';
import { down } from '../down.js';
import { restart } from '../restart.js';
import { logs } from '../logs.js';
import { status } from '../status.js';
import { DockerCommandExecutionError } from '../../errors.js';

const execaMock = vi.hoisted(() => vi.fn());

// Mock execa to avoid running real Docker commands
vi.mock('execa', () => ({ execa: execaMock }));

describe('lifecycle commands', () => {
  let testDir: string;
  let composeFile: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lifecycle-test-'));
    composeFile = path.join(testDir, 'docker-compose.yml');

    execaMock.mockReset();
    execaMock.mockResolvedValue({ stdout: '', stderr: '' });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await init(testDir, { host: ['example.test'], version: '18.0', skipHostCheck: true });
    execaMock.mockClear();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(testDir);
  });

  function composeCalls(): unknown[][] {
    return execaMock.mock.calls.filter((call) => Array.isArray(call[1]) && call[1].includes('-f'));
  }

  test('up starts everything detached', async () => {
    await up(testDir, undefined, {});

    expect(composeCalls()).toEqual([
      ['docker', ['compose', '-f', composeFile, 'up', '-d'], { stdio: 'inherit' }],
    ]);
  });

  test('up --attach runs one service in the foreground', async () => {
    await up(testDir, 'live', { attach: true });

    expect(composeCalls()).toEqual([
      ['docker', ['compose', '-f', composeFile, 'up', 'live'], { stdio: 'inherit' }],
    ]);
  });

  test('down and restart', async () => {
    await down(testDir);
    await restart(testDir, 'traefik');

    expect(composeCalls()).toEqual([
      ['docker', ['compose', '-f', composeFile, 'down'], { stdio: 'inherit' }],
      ['docker', ['compose', '-f', composeFile, 'restart', 'traefik'], { stdio: 'inherit' }],
    ]);
  });

  test('logs writes the output as received', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    execaMock.mockImplementation(async (_cmd: string, args: string[]) => {
      if (args.includes('logs')) {
        return { stdout: 'live-1  | listening on :8069\n', stderr: '' };
      }
      return { stdout: '', stderr: '' };
    });

    await logs(testDir, 'live');

    expect(write).toHaveBeenCalledWith('live-1  | listening on :8069\n');
  });

  test('status rethrows compose failures', async () => {
    execaMock.mockImplementation(async (_cmd: string, args: string[]) => {
      if (args.includes('ps')) {
        throw new Error('Cannot connect to the Docker daemon');
      }
      return { stdout: '', stderr: '' };
    });

    await expect(status(testDir)).rejects.toThrow(DockerCommandExecutionError);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Failed to get status'));
  });
});
