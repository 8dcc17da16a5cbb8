/**
 * Type definitions for WebDriver sessions against an Appium server
 */

import type { SessionCapabilities } from './capabilities.js';

export type CapabilityValue = string | number | boolean;

/**
 * Flat capability map; vendor keys are prefixed on the wire
 */
export type Capabilities = Record<string, CapabilityValue>;

/**
 * W3C locator strategies, plus the Appium ones the selectors map to
 */
export type LocatorStrategy = 'accessibility id' | 'id' | '-ios class chain' | '-android uiautomator' | 'xpath';

export interface Locator {
  using: LocatorStrategy;
  value: string;
}

export interface ElementHandle {
  elementId: string;
}

export type ScreenOrientation = 'PORTRAIT' | 'LANDSCAPE';

/**
 * The commands screenshot plans need from a live session
 */
export interface AutomationSession {
  readonly sessionId: string;

  /**
   * Poll for an element until it appears or the timeout expires.
   * Resolves to null when the element never shows up.
   */
  findElement(locator: Locator, timeoutMs: number, signal?: AbortSignal): Promise<ElementHandle | null>;
  click(element: ElementHandle, signal?: AbortSignal): Promise<void>;
  setOrientation(orientation: ScreenOrientation, signal?: AbortSignal): Promise<void>;
  getPageSource(signal?: AbortSignal): Promise<string>;
  close(): Promise<void>;
}

export interface SessionFactory {
  create(serverUrl: string, capabilities: SessionCapabilities, signal?: AbortSignal): Promise<AutomationSession>;
}

export interface DriverSessionConfig {
  /**
   * Path prefix of the WebDriver endpoints
   * @default '' (Appium 2)
   */
  basePath?: string;

  /**
   * Maximum time for session creation, which includes app install on the server side
   * @default 300000
   */
  sessionTimeout?: number;

  /**
   * Interval between element lookups
   * @default 500
   */
  pollInterval?: number;

  /**
   * Timeout for single commands (ms)
   * @default 60000
   */
  commandTimeout?: number;
}

/**
 * W3C element reference key
 */
export const ELEMENT_KEY = 'element-6066-11e4-a52e-4f735466cecf';
