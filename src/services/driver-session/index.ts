/**
 * WebDriver sessions against an Appium server
 */

export { WebDriverSession, WebDriverSessionFactory } from './driver-session.js';
export {
  flattenCapabilities,
  toW3CCapabilities,
  type AndroidSessionCapabilities,
  type IosSessionCapabilities,
  type SessionCapabilities,
} from './capabilities.js';

export type {
  AutomationSession,
  Capabilities,
  CapabilityValue,
  DriverSessionConfig,
  ElementHandle,
  Locator,
  LocatorStrategy,
  ScreenOrientation,
  SessionFactory,
} from './types.js';

export { ELEMENT_KEY } from './types.js';

export {
  DriverSessionError,
  SessionCreationError,
  SessionTerminationError,
  WebDriverCommandError,
  InvalidCapabilitiesError,
} from './errors.js';
