/**
 * Launcher contract tests
 *
 * The port probe, the prompt and the process spawn are injected; the
 * profile directory is created for real under a temp dir. The listener
 * test runs the real probe and chrome-launcher against a loopback server.
 */

import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as net from 'node:net';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import type * as chromeLauncher from 'chrome-launcher';

import { createRecordingLogger, silentLogger } from '@/__testutils__/logger.js';
import { createTempDir, removeTempDir } from '@/__testutils__/tempDir.js';
import type { LaunchedBrowser } from '@/types.js';
import { ExecutableNotFoundError, ProcessSpawnError } from '@/utils/errors.js';

import {
  checkDebugPort,
  defaultProfileDir,
  ensureProfileDir,
  launchBrowser,
  type LauncherDeps,
} from '../launcher.js';

interface FakeProcess {
  spawned: chromeLauncher.Options[];
  killed: number;
  exit: (code: number | null) => void;
  spawn: NonNullable<LauncherDeps['spawn']>;
}

function createFakeProcess(pid = 4242): FakeProcess {
  let resolveExit: (code: number | null) => void = () => {};
  const exited = new Promise<number | null>((resolve) => {
    resolveExit = resolve;
  });
  const fake: FakeProcess = {
    spawned: [],
    killed: 0,
    exit: (code) => resolveExit(code),
    spawn: (options) => {
      fake.spawned.push(options);
      const browser: LaunchedBrowser = {
        pid,
        port: options.port ?? 0,
        userDataDir: typeof options.userDataDir === 'string' ? options.userDataDir : '',
        exited,
        kill: () => {
          fake.killed++;
          resolveExit(null);
        },
      };
      return Promise.resolve(browser);
    },
  };
  return fake;
}

const resolveExecutable = (): { path: string } => ({ path: '/opt/browser/chrome' });

describe('defaultProfileDir', () => {
  it('should live under ~/.chatcap', () => {
    assert.equal(defaultProfileDir('/home/tester'), path.join('/home/tester', '.chatcap', 'chrome-profile'));
  });
});

describe('ensureProfileDir', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should create missing parent directories', async () => {
    const dir = path.join(tempDir, 'a', 'b', 'profile');

    assert.equal(await ensureProfileDir(dir), dir);
    assert.equal(fs.statSync(dir).isDirectory(), true);
  });

  it('should accept an existing directory', async () => {
    assert.equal(await ensureProfileDir(tempDir), tempDir);
  });

  it('should throw ProcessSpawnError naming the directory when a file is in the way', async () => {
    const blocker = path.join(tempDir, 'blocker');
    fs.writeFileSync(blocker, '');
    const dir = path.join(blocker, 'profile');

    await assert.rejects(ensureProfileDir(dir), (error: unknown) => {
      assert.ok(error instanceof ProcessSpawnError);
      assert.ok(error.message.startsWith(`Cannot create profile directory ${dir}: `));
      assert.equal(error.exitCode, 100);
      return true;
    });
  });
});

describe('checkDebugPort', () => {
  const endpoint = { host: '127.0.0.1', port: 9222 };

  it('should proceed without asking when the port is free', async () => {
    const questions: string[] = [];

    const proceed = await checkDebugPort(endpoint, {
      probe: () => Promise.resolve(false),
      confirm: (question) => {
        questions.push(question);
        return Promise.resolve(false);
      },
      logger: silentLogger,
    });

    assert.equal(proceed, true);
    assert.deepEqual(questions, []);
  });

  it('should report a bound port and return the operator answer', async () => {
    const logger = createRecordingLogger();
    const questions: string[] = [];

    const proceed = await checkDebugPort(endpoint, {
      probe: () => Promise.resolve(true),
      confirm: (question) => {
        questions.push(question);
        return Promise.resolve(true);
      },
      logger,
    });

    assert.equal(proceed, true);
    assert.deepEqual(logger.infos, ['Port 9222 is already in use']);
    assert.deepEqual(questions, [
      'Port 9222 is already in use, probably by a running browser. Launch another one anyway?',
    ]);
  });

  it('should not ask when assumeYes is set', async () => {
    let asked = false;

    const proceed = await checkDebugPort(
      { ...endpoint, assumeYes: true },
      {
        probe: () => Promise.resolve(true),
        confirm: () => {
          asked = true;
          return Promise.resolve(false);
        },
        logger: silentLogger,
      }
    );

    assert.equal(proceed, true);
    assert.equal(asked, false);
  });

  it('should keep the existing browser when no prompt is available', async () => {
    const proceed = await checkDebugPort(endpoint, {
      probe: () => Promise.resolve(true),
      logger: silentLogger,
    });

    assert.equal(proceed, false);
  });
});

describe('launchBrowser', () => {
  let tempDir: string;
  let profileDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
    profileDir = path.join(tempDir, 'profile');
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should spawn the resolved executable and wait for it to exit', async () => {
    const fake = createFakeProcess();
    const logger = createRecordingLogger();

    const outcome = launchBrowser(
      {
        port: 9333,
        userDataDir: profileDir,
        startingUrl: 'https://chat.example.com/',
        extraFlags: ['--window-size=1280,900'],
        logger,
      },
      { resolveExecutable, probe: () => Promise.resolve(false), spawn: fake.spawn }
    );
    setImmediate(() => fake.exit(0));

    assert.deepEqual(await outcome, { status: 'exited', pid: 4242, port: 9333, exitCode: 0 });

    const [options] = fake.spawned;
    assert.ok(options);
    assert.equal(options.chromePath, '/opt/browser/chrome');
    assert.equal(options.port, 9333);
    assert.equal(options.userDataDir, profileDir);
    assert.equal(options.ignoreDefaultFlags, true);
    assert.equal(options.handleSIGINT, false);
    assert.equal(options.startingUrl, 'https://chat.example.com/');
    assert.equal(
      options.chromeFlags?.some((flag) => flag.startsWith('--remote-debugging-port')),
      false
    );
    assert.equal(options.chromeFlags?.at(-1), '--window-size=1280,900');
    assert.equal(fs.statSync(profileDir).isDirectory(), true);
    assert.equal(logger.infos[0], 'Launching browser with remote debugging on port 9333...');
    assert.equal(logger.infos.at(-1), 'Browser exited with code 0');
  });

  it('should return reused without spawning when the operator keeps the running browser', async () => {
    const fake = createFakeProcess();
    const logger = createRecordingLogger();

    const outcome = await launchBrowser(
      { port: 9222, userDataDir: profileDir, logger },
      {
        resolveExecutable,
        probe: () => Promise.resolve(true),
        confirm: () => Promise.resolve(false),
        spawn: fake.spawn,
      }
    );

    assert.deepEqual(outcome, { status: 'reused', port: 9222 });
    assert.equal(fake.spawned.length, 0);
    assert.equal(fs.existsSync(profileDir), false);
    assert.equal(
      logger.infos.at(-1),
      'Keeping the browser already listening on port 9222; connect with: chatcap capture --port 9222'
    );
  });

  it('should not probe or spawn when no executable is found', async () => {
    const fake = createFakeProcess();
    let probed = false;

    await assert.rejects(
      launchBrowser(
        { userDataDir: profileDir, logger: silentLogger },
        {
          resolveExecutable: () => {
            throw new ExecutableNotFoundError(['/usr/bin/google-chrome']);
          },
          probe: () => {
            probed = true;
            return Promise.resolve(false);
          },
          spawn: fake.spawn,
        }
      ),
      ExecutableNotFoundError
    );
    assert.equal(probed, false);
    assert.equal(fake.spawned.length, 0);
  });

  it('should wrap a spawn failure in ProcessSpawnError', async () => {
    await assert.rejects(
      launchBrowser(
        { userDataDir: profileDir, logger: silentLogger },
        {
          resolveExecutable,
          probe: () => Promise.resolve(false),
          spawn: () => Promise.reject(new Error('spawn EACCES')),
        }
      ),
      (error: unknown) => {
        assert.ok(error instanceof ProcessSpawnError);
        assert.equal(error.message, 'Failed to launch browser: spawn EACCES');
        return true;
      }
    );
  });

  it('should kill the browser when the signal aborts', async () => {
    const fake = createFakeProcess();
    const controller = new AbortController();

    const outcome = launchBrowser(
      { userDataDir: profileDir, signal: controller.signal, logger: silentLogger },
      { resolveExecutable, probe: () => Promise.resolve(false), spawn: fake.spawn }
    );
    setImmediate(() => controller.abort());

    assert.deepEqual(await outcome, { status: 'exited', pid: 4242, port: 9222, exitCode: null });
    assert.equal(fake.killed, 1);
  });

  describe('with a listener already on the port', () => {
    let server: net.Server;
    let port: number;

    beforeEach(async () => {
      server = net.createServer((socket) => socket.destroy());
      await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
      const address = server.address();
      assert.ok(address && typeof address === 'object');
      port = address.port;
    });

    afterEach(async () => {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('should throw ProcessSpawnError instead of reporting a launch when chrome-launcher reuses the listener', async () => {
      const logger = createRecordingLogger();

      await assert.rejects(
        launchBrowser(
          { port, userDataDir: profileDir, logger },
          { resolveExecutable: () => ({ path: '/bin/true' }), confirm: () => Promise.resolve(true) }
        ),
        (error: unknown) => {
          assert.ok(error instanceof ProcessSpawnError);
          assert.equal(
            error.message,
            `Cannot start another browser on port ${port}: the port already has a listener`
          );
          assert.deepEqual(error.suggestions, [
            `Use the running browser: chatcap capture --port ${port}`,
            'Or launch on a free port: chatcap launch --port <number>',
          ]);
          return true;
        }
      );
      assert.equal(logger.infos.at(-1), `Launching browser with remote debugging on port ${port}...`);
    });
  });
});
