/**
 * Automation server tests: health checks against an in-process HTTP server,
 * command line building and log capture
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { createServer, type Server, type ServerResponse } from 'node:http';
import { finished } from 'node:stream/promises';
import {
  AppiumServerController,
  AppiumStartupError,
  LogBuffer,
  LogCaptureStream,
  buildAppiumArgs,
  checkServerStatus,
  parseLogLevel,
  type AppiumLogEntry,
} from '../../src/services/appium-server/index.js';

type Responder = (res: ServerResponse) => void;

function json(body: unknown): Responder {
  return (res) => {
    res.writeHead(200, { 'content-type': 'application/json' });
    res.end(JSON.stringify(body));
  };
}

describe('checkServerStatus', () => {
  let server: Server;
  let serverUrl: string;
  let respond: Responder = json({ value: { ready: true } });

  before(async () => {
    server = createServer((_req, res) => respond(res));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (typeof address !== 'object' || address === null) {
      throw new Error('test server has no port');
    }
    serverUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should report a ready server as healthy', async () => {
    respond = json({ value: { ready: true, message: 'The server is ready to accept new connections' } });

    const result = await checkServerStatus(serverUrl, 1000);

    assert.strictEqual(result.healthy, true);
    assert.deepStrictEqual(result.status, { ready: true, message: 'The server is ready to accept new connections' });
  });

  it('should report a server that is not ready as unhealthy', async () => {
    respond = json({ value: { ready: false } });
    assert.strictEqual((await checkServerStatus(serverUrl, 1000)).healthy, false);
  });

  it('should accept servers that do not report readiness', async () => {
    respond = json({ value: { build: { version: '2.11.0' } } });
    assert.strictEqual((await checkServerStatus(serverUrl, 1000)).healthy, true);
  });

  it('should reject a status body without a value', async () => {
    respond = json({});

    const result = await checkServerStatus(serverUrl, 1000);

    assert.strictEqual(result.healthy, false);
    assert.strictEqual(result.error, 'Missing value in /status response');
  });

  it('should reject a body that is not JSON', async () => {
    respond = (res) => {
      res.writeHead(503);
      res.end('starting');
    };

    const result = await checkServerStatus(serverUrl, 1000);

    assert.strictEqual(result.healthy, false);
    assert.strictEqual(result.error, 'Unparseable /status response (HTTP 503)');
  });

  it('should refuse to start over a port that is already serving', async () => {
    respond = json({ value: { ready: true } });
    const port = Number(new URL(serverUrl).port);
    const controller = new AppiumServerController({ host: '127.0.0.1', appiumPath: '/nonexistent/appium' });

    await assert.rejects(
      controller.start(port),
      (error: unknown) =>
        error instanceof AppiumStartupError &&
        error.message === `Port ${port} is already serving another automation server`
    );
    assert.strictEqual(controller.isRunning(port), false);
  });
});

describe('AppiumServerController', () => {
  it('should build URLs from the configured host', () => {
    assert.strictEqual(new AppiumServerController({ host: '0.0.0.0' }).serverUrl(4733), 'http://0.0.0.0:4733');
  });

  it('should treat stopping an unknown port as a no-op', async () => {
    const controller = new AppiumServerController();

    await controller.stop(4723);

    assert.strictEqual(controller.isRunning(4723), false);
  });
});

describe('buildAppiumArgs', () => {
  it('should bind the host and port with relaxed security', () => {
    assert.deepStrictEqual(buildAppiumArgs('127.0.0.1', 4723, 'info'), [
      '--address',
      '127.0.0.1',
      '--port',
      '4723',
      '--log-level',
      'info',
      '--relaxed-security',
    ]);
  });

  it('should keep extra arguments first without repeating relaxed security', () => {
    assert.deepStrictEqual(buildAppiumArgs('127.0.0.1', 4733, 'debug', ['--relaxed-security', '--use-drivers', 'xcuitest']), [
      '--relaxed-security',
      '--use-drivers',
      'xcuitest',
      '--address',
      '127.0.0.1',
      '--port',
      '4733',
      '--log-level',
      'debug',
    ]);
  });
});

describe('Log capture', () => {
  it('should classify lines by level', () => {
    assert.strictEqual(parseLogLevel('[HTTP] Error: socket hang up'), 'error');
    assert.strictEqual(parseLogLevel('[Appium] Warning: deprecated capability'), 'warn');
    assert.strictEqual(parseLogLevel('[debug] [XCUITest] Polling'), 'debug');
    assert.strictEqual(parseLogLevel('[Appium] Welcome to Appium'), 'info');
  });

  it('should keep only the most recent entries', () => {
    const buffer = new LogBuffer(2);
    for (const message of ['one', 'two', 'three']) {
      buffer.add({ timestamp: new Date(), level: 'info', message });
    }

    assert.strictEqual(buffer.size(), 2);
    assert.deepStrictEqual(
      buffer.getRecent(5).map((entry) => entry.message),
      ['two', 'three']
    );
  });

  it('should join partial lines across chunks and flush the last one on end', async () => {
    const seen: AppiumLogEntry[] = [];
    const stream = new LogCaptureStream(new LogBuffer(), (entry) => seen.push(entry));

    stream.write('[Appium] listening\n[HTTP] Err');
    stream.write('or: bad request\n\n');
    stream.end('[debug] tail');
    await finished(stream);

    assert.deepStrictEqual(
      seen.map((entry) => [entry.level, entry.message]),
      [
        ['info', '[Appium] listening'],
        ['error', '[HTTP] Error: bad request'],
        ['debug', '[debug] tail'],
      ]
    );
    assert.strictEqual(stream.getBuffer().size(), 3);
  });
});
