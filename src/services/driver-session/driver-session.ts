/**
 * Driver Session - a W3C WebDriver session on an Appium server
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { createModuleLogger, type Logger } from '../../utils/logger.js';
import { toW3CCapabilities, type SessionCapabilities } from './capabilities.js';
import { SessionCreationError, SessionTerminationError, WebDriverCommandError } from './errors.js';
import {
  ELEMENT_KEY,
  type AutomationSession,
  type DriverSessionConfig,
  type ElementHandle,
  type Locator,
  type ScreenOrientation,
  type SessionFactory,
} from './types.js';

const DEFAULTS = {
  basePath: '',
  sessionTimeout: 300000,
  pollInterval: 500,
  commandTimeout: 60000,
};

type Method = 'GET' | 'POST' | 'DELETE';

interface CommandOptions {
  body?: unknown;
  signal?: AbortSignal;
  timeoutMs: number;
}

/**
 * Abort when either the caller's signal fires or the timeout elapses
 */
function linkedSignal(timeoutMs: number, signal?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`Operation timed out after ${timeoutMs}ms`)), timeoutMs);
  const onAbort = (): void => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onAbort, { once: true });
  if (signal?.aborted) {
    controller.abort(signal.reason);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Send one WebDriver command and unwrap `value` from the response
 */
async function sendCommand(url: string, method: Method, options: CommandOptions, sessionId?: string): Promise<unknown> {
  const { signal, dispose } = linkedSignal(options.timeoutMs, options.signal);
  try {
    const response = await fetch(url, {
      method,
      headers: { 'Content-Type': 'application/json; charset=utf-8', Accept: 'application/json' },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal,
    });

    const text = await response.text();
    let payload: unknown = null;
    if (text) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = null;
      }
    }
    const value: unknown = typeof payload === 'object' && payload !== null ? Reflect.get(payload, 'value') : undefined;

    if (!response.ok) {
      const webdriverError = readString(value, 'error') ?? 'unknown error';
      const message = readString(value, 'message') ?? (text.slice(0, 500) || response.statusText);
      throw new WebDriverCommandError(
        `${method} ${new URL(url).pathname} failed: ${response.status} ${webdriverError} - ${message}`,
        response.status,
        webdriverError,
        sessionId
      );
    }

    return value;
  } finally {
    dispose();
  }
}

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

export class WebDriverSession implements AutomationSession {
  private closed = false;
  private logger: Logger;

  constructor(
    private sessionUrl: string,
    public readonly sessionId: string,
    private config: Required<DriverSessionConfig>,
    logger: Logger
  ) {
    this.logger = logger.child({ sessionId });
  }

  private command(method: Method, path: string, body?: unknown, signal?: AbortSignal): Promise<unknown> {
    return sendCommand(
      `${this.sessionUrl}${path}`,
      method,
      { body, signal, timeoutMs: this.config.commandTimeout },
      this.sessionId
    );
  }

  async findElement(locator: Locator, timeoutMs: number, signal?: AbortSignal): Promise<ElementHandle | null> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      try {
        const value = await this.command('POST', '/element', locator, signal);
        const elementId = readString(value, ELEMENT_KEY) ?? readString(value, 'ELEMENT');
        if (elementId) {
          return { elementId };
        }
      } catch (error) {
        if (!(error instanceof WebDriverCommandError) || error.webdriverError !== 'no such element') {
          throw error;
        }
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return null;
      }
      await sleep(Math.min(this.config.pollInterval, remaining), undefined, { signal });
    }
  }

  async click(element: ElementHandle, signal?: AbortSignal): Promise<void> {
    await this.command('POST', `/element/${encodeURIComponent(element.elementId)}/click`, {}, signal);
  }

  async setOrientation(orientation: ScreenOrientation, signal?: AbortSignal): Promise<void> {
    await this.command('POST', '/orientation', { orientation }, signal);
  }

  async getPageSource(signal?: AbortSignal): Promise<string> {
    const value = await this.command('GET', '/source', undefined, signal);
    return typeof value === 'string' ? value : '';
  }

  async setImplicitWait(ms: number, signal?: AbortSignal): Promise<void> {
    await this.command('POST', '/timeouts', { implicit: ms }, signal);
  }

  /**
   * Delete the remote session. A session the server no longer knows is
   * treated as closed.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    this.logger.info('Deleting driver session');
    try {
      await sendCommand(this.sessionUrl, 'DELETE', { timeoutMs: this.config.commandTimeout }, this.sessionId);
    } catch (error) {
      if (error instanceof WebDriverCommandError && error.status === 404) {
        return;
      }
      throw new SessionTerminationError(
        `Failed to stop session: ${error instanceof Error ? error.message : String(error)}`,
        this.sessionId,
        error instanceof Error ? error : undefined
      );
    }
  }
}

/**
 * Creates WebDriver sessions over HTTP
 */
export class WebDriverSessionFactory implements SessionFactory {
  private config: Required<DriverSessionConfig>;
  private logger: Logger;

  constructor(config: DriverSessionConfig = {}, logger?: Logger) {
    this.logger = logger ?? createModuleLogger('driver-session');
    this.config = {
      basePath: config.basePath ?? DEFAULTS.basePath,
      sessionTimeout: config.sessionTimeout || DEFAULTS.sessionTimeout,
      pollInterval: config.pollInterval || DEFAULTS.pollInterval,
      commandTimeout: config.commandTimeout || DEFAULTS.commandTimeout,
    };
  }

  private buildSessionUrl(serverUrl: string, remoteSessionId?: string): string {
    const baseUrl = serverUrl.replace(/\/$/, '');
    const basePath = this.config.basePath.replace(/\/$/, '');
    return remoteSessionId ? `${baseUrl}${basePath}/session/${remoteSessionId}` : `${baseUrl}${basePath}/session`;
  }

  async create(serverUrl: string, capabilities: SessionCapabilities, signal?: AbortSignal): Promise<WebDriverSession> {
    const alwaysMatch = toW3CCapabilities(capabilities);
    const startTime = Date.now();

    this.logger.info(
      { serverUrl, platform: capabilities.platformName, device: capabilities.deviceName },
      'Starting driver session'
    );

    let value: unknown;
    try {
      value = await sendCommand(this.buildSessionUrl(serverUrl), 'POST', {
        body: { capabilities: { alwaysMatch, firstMatch: [{}] } },
        signal,
        timeoutMs: this.config.sessionTimeout,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new SessionCreationError(`Failed to create session: ${message}`, error instanceof Error ? error : undefined);
    }

    const sessionId = readString(value, 'sessionId');
    if (!sessionId) {
      throw new SessionCreationError('Failed to create session: response carried no sessionId');
    }

    this.logger.info({ sessionId, duration: Date.now() - startTime }, 'Driver session created');

    const session = new WebDriverSession(this.buildSessionUrl(serverUrl, sessionId), sessionId, this.config, this.logger);
    // All waits are explicit
    try {
      await session.setImplicitWait(0, signal);
    } catch (error) {
      // The caller never sees this session, so it has to be deleted here
      await session.close().catch((closeError: unknown) => {
        this.logger.warn(
          { sessionId, error: closeError instanceof Error ? closeError.message : String(closeError) },
          'Failed to delete driver session after setup failure'
        );
      });
      throw error;
    }
    return session;
  }
}
