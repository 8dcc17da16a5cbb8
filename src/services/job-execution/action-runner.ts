/**
 * Action Runner - executes one screenshot plan on a live session
 */

import { mkdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '../../utils/logger.js';
import { delay } from '../../utils/polling.js';
import type { AutomationSession, Locator } from '../driver-session/types.js';
import {
  CONFIG_DEFAULTS,
  type Orientation,
  type RunConfig,
  type ScreenshotAction,
  type ScreenshotPlan,
  type Selector,
} from '../run-config/types.js';
import type { RunJob } from '../run-plan/types.js';
import { ActionError, ActionErrorType, errorMessage, toError } from './errors.js';
import type { PlatformAdapter, ProvisionedDevice } from './platform-adapter.js';
import { describeLocator, toLocator } from './selectors.js';
import type { ImageInspector, ScreenshotResult } from './types.js';

/** Settle time after rotating the device */
export const ORIENTATION_SETTLE_MS = 1000;
export const DISMISSOR_LOOKUP_MS = 2000;
export const DISMISSOR_CLICK_DELAY_MS = 500;
export const DEFAULT_WAIT_FOR_MS = 10000;

export interface ActionRunnerOptions {
  job: RunJob;
  config: RunConfig;
  session: AutomationSession;
  adapter: PlatformAdapter;
  device: ProvisionedDevice;
  imageInspector: ImageInspector;
  logger: Logger;
}

export interface PlanOutcome {
  screenshots: ScreenshotResult[];
  warnings: string[];
}

/**
 * Lowercase and check the configured orientation
 */
export function parseOrientation(value: string | undefined, plan?: string): Orientation | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (normalized === 'portrait' || normalized === 'landscape') {
    return normalized;
  }
  throw new ActionError(ActionErrorType.INVALID_ORIENTATION, `Invalid orientation: ${value}`, plan);
}

/**
 * Screenshot file name; the language suffix keeps same-named captures apart
 */
export function screenshotFileName(name: string, language: string): string {
  return `${name}_${language}.png`;
}

export class ActionRunner {
  private logger: Logger;

  constructor(private options: ActionRunnerOptions) {
    this.logger = options.logger;
  }

  private get elementTimeoutMs(): number {
    return this.options.config.timeouts.implicitWaitMs ?? CONFIG_DEFAULTS.elementTimeoutMs;
  }

  /**
   * Run a plan: orientation, dismissors, actions, then the assertion
   */
  async runPlan(plan: ScreenshotPlan, signal?: AbortSignal): Promise<PlanOutcome> {
    const outcome: PlanOutcome = { screenshots: [], warnings: [] };
    this.logger.info({ plan: plan.name, actions: plan.actions.length }, 'Running screenshot plan');

    const orientation = parseOrientation(plan.orientation, plan.name);
    if (orientation) {
      await this.options.session.setOrientation(orientation === 'portrait' ? 'PORTRAIT' : 'LANDSCAPE', signal);
      await delay(ORIENTATION_SETTLE_MS, signal);
    }

    await this.runDismissors(signal);

    for (const action of plan.actions) {
      signal?.throwIfAborted();
      const screenshot = await this.runAction(action, plan, orientation ?? 'portrait', signal);
      if (screenshot) {
        outcome.screenshots.push(screenshot);
      }
    }

    const warning = await this.checkAssertion(plan, signal);
    if (warning) {
      outcome.warnings.push(warning);
    }

    return outcome;
  }

  private async runAction(
    action: ScreenshotAction,
    plan: ScreenshotPlan,
    orientation: Orientation,
    signal?: AbortSignal
  ): Promise<ScreenshotResult | undefined> {
    switch (action.type) {
      case 'tap': {
        const locator = this.locatorFor(action.selector, plan.name);
        const element = await this.command('tap', plan.name, signal, () =>
          this.options.session.findElement(locator, this.elementTimeoutMs, signal)
        );
        if (!element) {
          throw new ActionError(
            ActionErrorType.ELEMENT_NOT_FOUND,
            `Element not found for tap: ${describeLocator(locator)}`,
            plan.name
          );
        }
        await this.command('tap', plan.name, signal, () => this.options.session.click(element, signal));
        this.logger.debug({ locator: describeLocator(locator) }, 'Tapped element');
        return undefined;
      }

      case 'wait': {
        const seconds = action.seconds ?? CONFIG_DEFAULTS.waitSeconds;
        await delay(seconds * 1000, signal);
        return undefined;
      }

      case 'wait_for': {
        const locator = this.locatorFor(action.selector, plan.name);
        const timeoutMs = action.timeoutMs ?? this.options.config.timeouts.defaultWaitMs ?? DEFAULT_WAIT_FOR_MS;
        const element = await this.command('wait_for', plan.name, signal, () =>
          this.options.session.findElement(locator, timeoutMs, signal)
        );
        if (!element) {
          throw new ActionError(
            ActionErrorType.TIMEOUT,
            `Element did not appear within ${timeoutMs}ms: ${describeLocator(locator)}`,
            plan.name
          );
        }
        return undefined;
      }

      case 'capture':
        return this.capture(action.name, plan.name, orientation, signal);
    }
  }

  /**
   * Session call made by an action; server errors become action errors
   */
  private async command<T>(
    action: string,
    plan: string,
    signal: AbortSignal | undefined,
    call: () => Promise<T>
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new ActionError(
        ActionErrorType.COMMAND_FAILED,
        `${action} failed: ${errorMessage(error)}`,
        plan,
        toError(error)
      );
    }
  }

  private locatorFor(selector: Selector, plan: string): Locator {
    const locator = toLocator(selector);
    if (!locator) {
      throw new ActionError(ActionErrorType.INVALID_SELECTOR, 'Selector has no locator strategy', plan);
    }
    return locator;
  }

  /**
   * Close transient popups. Nothing found is fine; lookup errors are logged.
   */
  private async runDismissors(signal?: AbortSignal): Promise<void> {
    const selectors = this.options.adapter.pick(this.options.config.dismissors) ?? [];

    for (const selector of selectors) {
      const locator = toLocator(selector);
      if (!locator) {
        continue;
      }

      try {
        const element = await this.options.session.findElement(locator, DISMISSOR_LOOKUP_MS, signal);
        if (!element) {
          this.logger.debug({ locator: describeLocator(locator) }, 'Dismissor not present');
          continue;
        }
        await this.options.session.click(element, signal);
        this.logger.debug({ locator: describeLocator(locator) }, 'Dismissed element');
        await delay(DISMISSOR_CLICK_DELAY_MS, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        this.logger.warn({ locator: describeLocator(locator), error: errorMessage(error) }, 'Dismissor failed');
      }
    }
  }

  private async capture(
    name: string,
    plan: string,
    orientation: Orientation,
    signal?: AbortSignal
  ): Promise<ScreenshotResult> {
    const { job, adapter, device, imageInspector } = this.options;
    const path = join(job.outputDirectory, screenshotFileName(name, job.language));

    try {
      await mkdir(job.outputDirectory, { recursive: true });
      await adapter.screenshot(device, path, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new ActionError(
        ActionErrorType.CAPTURE_FAILED,
        `Failed to capture ${name}: ${errorMessage(error)}`,
        plan,
        toError(error)
      );
    }

    const result: ScreenshotResult = {
      name,
      language: job.language,
      path,
      orientation,
      timestamp: new Date(),
      success: true,
    };

    try {
      result.sizeBytes = (await stat(path)).size;
      result.dimensions = await imageInspector.dimensions(path);
    } catch (error) {
      this.logger.warn({ path, error: errorMessage(error) }, 'Could not read screenshot dimensions');
    }

    this.logger.info({ name, path, dimensions: result.dimensions }, 'Captured screenshot');
    return result;
  }

  /**
   * Presence check after the actions. A missing element is a warning only.
   */
  private async checkAssertion(plan: ScreenshotPlan, signal?: AbortSignal): Promise<string | undefined> {
    const selector = this.options.adapter.pick(plan.assert);
    if (!selector) {
      return undefined;
    }

    const locator = this.locatorFor(selector, plan.name);
    const element = await this.options.session.findElement(locator, this.elementTimeoutMs, signal);
    if (element) {
      return undefined;
    }

    const warning = `Assertion failed for ${plan.name}: element not found (${describeLocator(locator)})`;
    this.logger.warn({ plan: plan.name, locator: describeLocator(locator) }, 'Assertion element not found');
    return warning;
  }
}
