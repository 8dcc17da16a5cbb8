/**
 * Driver session tests against an in-process WebDriver endpoint
 */

import { describe, it, before, after, beforeEach } from 'node:test';
import assert from 'node:assert';
import { createServer, type IncomingMessage, type Server } from 'node:http';
import {
  ELEMENT_KEY,
  SessionCreationError,
  WebDriverCommandError,
  WebDriverSessionFactory,
  flattenCapabilities,
  toW3CCapabilities,
  type IosSessionCapabilities,
} from '../../src/services/driver-session/index.js';

const SESSION_ID = 'abc';

function iosCapabilities(overrides: Partial<IosSessionCapabilities> = {}): IosSessionCapabilities {
  return {
    platform: 'ios',
    platformName: 'iOS',
    automationName: 'XCUITest',
    platformVersion: '17.5',
    deviceName: 'iPhone 15',
    app: '/apps/App.app',
    language: 'en_US',
    locale: 'en_US',
    noReset: true,
    newCommandTimeout: 300,
    udid: 'SIM-0001',
    wdaLocalPort: 4724,
    autoAcceptAlerts: true,
    wdaStartupRetries: 3,
    extensions: {},
    ...overrides,
  };
}

interface RecordedRequest {
  method: string;
  path: string;
  body: unknown;
}

/**
 * Minimal WebDriver endpoint: one session, elements looked up by value
 */
class FakeWebDriver {
  readonly requests: RecordedRequest[] = [];
  presentElements = new Set<string>();
  createStatus = 200;
  deleteStatus = 200;
  timeoutsStatus = 200;
  private server: Server = createServer((req, res) => {
    void this.handle(req).then(([status, body]) => {
      res.writeHead(status, { 'content-type': 'application/json' });
      res.end(JSON.stringify(body));
    });
  });
  url = '';

  async listen(): Promise<void> {
    await new Promise<void>((resolve) => this.server.listen(0, '127.0.0.1', resolve));
    const address = this.server.address();
    if (typeof address !== 'object' || address === null) {
      throw new Error('fake WebDriver has no port');
    }
    this.url = `http://127.0.0.1:${address.port}`;
  }

  async close(): Promise<void> {
    this.server.closeAllConnections();
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }

  reset(): void {
    this.requests.length = 0;
    this.presentElements.clear();
    this.createStatus = 200;
    this.deleteStatus = 200;
    this.timeoutsStatus = 200;
  }

  paths(): string[] {
    return this.requests.map((r) => `${r.method} ${r.path}`);
  }

  private async handle(req: IncomingMessage): Promise<[number, unknown]> {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.from(chunk));
    }
    const text = Buffer.concat(chunks).toString('utf8');
    const body: unknown = text ? JSON.parse(text) : undefined;
    const method = req.method ?? 'GET';
    const path = req.url ?? '/';
    this.requests.push({ method, path, body });

    const session = `/session/${SESSION_ID}`;
    if (method === 'POST' && path === '/session') {
      if (this.createStatus !== 200) {
        return [this.createStatus, { value: { error: 'session not created', message: 'xcodebuild failed' } }];
      }
      return [200, { value: { sessionId: SESSION_ID, capabilities: {} } }];
    }
    if (method === 'POST' && path === `${session}/element`) {
      const value = typeof body === 'object' && body !== null ? Reflect.get(body, 'value') : undefined;
      if (value === 'crash') {
        return [500, { value: { error: 'unknown error', message: 'instrumentation crashed' } }];
      }
      if (typeof value === 'string' && this.presentElements.has(value)) {
        return [200, { value: { [ELEMENT_KEY]: `el-${value}` } }];
      }
      return [404, { value: { error: 'no such element', message: 'not found' } }];
    }
    if (method === 'POST' && path === `${session}/timeouts` && this.timeoutsStatus !== 200) {
      return [this.timeoutsStatus, { value: { error: 'unknown error', message: 'timeouts rejected' } }];
    }
    if (method === 'GET' && path === `${session}/source`) {
      return [200, { value: '<hierarchy/>' }];
    }
    if (method === 'DELETE' && path === session) {
      return [this.deleteStatus, { value: this.deleteStatus === 200 ? null : { error: 'invalid session id', message: 'gone' } }];
    }
    return [200, { value: null }];
  }
}

describe('Session capabilities', () => {
  it('should flatten typed capabilities and drop unset values', () => {
    const flat = flattenCapabilities(iosCapabilities({ udid: undefined }));

    assert.strictEqual(flat.platformName, 'iOS');
    assert.strictEqual(flat.wdaLocalPort, 4724);
    assert.strictEqual('udid' in flat, false);
    assert.strictEqual('platform' in flat, false);
    assert.strictEqual('extensions' in flat, false);
  });

  it('should let extensions override typed values', () => {
    const flat = flattenCapabilities(iosCapabilities({ extensions: { newCommandTimeout: 600 } }));
    assert.strictEqual(flat.newCommandTimeout, 600);
  });

  it('should prefix non-W3C capabilities with appium:', () => {
    const w3c = toW3CCapabilities(iosCapabilities({ extensions: { 'bstack:debug': true, showXcodeLog: true } }));

    assert.strictEqual(w3c.platformName, 'iOS');
    assert.strictEqual(w3c['appium:automationName'], 'XCUITest');
    assert.strictEqual(w3c['appium:udid'], 'SIM-0001');
    assert.strictEqual(w3c['appium:showXcodeLog'], true);
    assert.strictEqual(w3c['bstack:debug'], true);
    assert.strictEqual('automationName' in w3c, false);
  });
});

describe('WebDriverSessionFactory', () => {
  const webdriver = new FakeWebDriver();
  const factory = new WebDriverSessionFactory({ pollInterval: 10, commandTimeout: 2000, sessionTimeout: 2000 });

  before(async () => {
    await webdriver.listen();
  });

  after(async () => {
    await webdriver.close();
  });

  beforeEach(() => {
    webdriver.reset();
  });

  it('should create a session with W3C capabilities and disable implicit waits', async () => {
    const session = await factory.create(webdriver.url, iosCapabilities());

    assert.strictEqual(session.sessionId, SESSION_ID);
    assert.deepStrictEqual(webdriver.paths(), ['POST /session', 'POST /session/abc/timeouts']);

    const [create, timeouts] = webdriver.requests;
    assert.deepStrictEqual(create.body, {
      capabilities: { alwaysMatch: toW3CCapabilities(iosCapabilities()), firstMatch: [{}] },
    });
    assert.deepStrictEqual(timeouts.body, { implicit: 0 });
  });

  it('should wrap a rejected session request', async () => {
    webdriver.createStatus = 500;

    await assert.rejects(
      factory.create(webdriver.url, iosCapabilities()),
      (error: unknown) =>
        error instanceof SessionCreationError &&
        error.message === 'Failed to create session: POST /session failed: 500 session not created - xcodebuild failed'
    );
  });

  it('should delete the session when disabling implicit waits fails', async () => {
    webdriver.timeoutsStatus = 500;

    await assert.rejects(
      factory.create(webdriver.url, iosCapabilities()),
      (error: unknown) => error instanceof WebDriverCommandError && error.status === 500
    );
    assert.deepStrictEqual(webdriver.paths(), ['POST /session', 'POST /session/abc/timeouts', 'DELETE /session/abc']);
  });

  it('should find an element that exists', async () => {
    webdriver.presentElements.add('settings');
    const session = await factory.create(webdriver.url, iosCapabilities());

    const element = await session.findElement({ using: 'accessibility id', value: 'settings' }, 1000);

    assert.deepStrictEqual(element, { elementId: 'el-settings' });
  });

  it('should poll until the timeout and return null for a missing element', async () => {
    const session = await factory.create(webdriver.url, iosCapabilities());

    const element = await session.findElement({ using: 'id', value: 'missing' }, 50);

    assert.strictEqual(element, null);
    const lookups = webdriver.paths().filter((p) => p === 'POST /session/abc/element');
    assert.ok(lookups.length >= 2, `expected repeated lookups, got ${lookups.length}`);
  });

  it('should surface WebDriver errors other than no such element', async () => {
    const session = await factory.create(webdriver.url, iosCapabilities());

    await assert.rejects(
      session.findElement({ using: 'xpath', value: 'crash' }, 1000),
      (error: unknown) =>
        error instanceof WebDriverCommandError &&
        error.status === 500 &&
        error.message === 'POST /session/abc/element failed: 500 unknown error - instrumentation crashed'
    );
  });

  it('should click, rotate and read the page source', async () => {
    const session = await factory.create(webdriver.url, iosCapabilities());

    await session.click({ elementId: 'el-settings' });
    await session.setOrientation('LANDSCAPE');
    const source = await session.getPageSource();

    assert.strictEqual(source, '<hierarchy/>');
    assert.deepStrictEqual(webdriver.paths().slice(2), [
      'POST /session/abc/element/el-settings/click',
      'POST /session/abc/orientation',
      'GET /session/abc/source',
    ]);
    assert.deepStrictEqual(webdriver.requests[3].body, { orientation: 'LANDSCAPE' });
  });

  it('should delete the session once', async () => {
    const session = await factory.create(webdriver.url, iosCapabilities());

    await session.close();
    await session.close();

    assert.deepStrictEqual(
      webdriver.paths().filter((p) => p.startsWith('DELETE')),
      ['DELETE /session/abc']
    );
  });

  it('should treat a session the server no longer knows as closed', async () => {
    webdriver.deleteStatus = 404;
    const session = await factory.create(webdriver.url, iosCapabilities());

    await session.close();
  });
});
