/**
 * Run Configuration Service - Index
 */

export {
  PLATFORMS,
  PLATFORM_LABELS,
  CONFIG_DEFAULTS,
  type Platform,
  type PlatformPair,
  type RunConfig,
  type Selector,
  type ScreenshotAction,
  type ScreenshotPlan,
  type IosDevice,
  type AndroidDevice,
  type LocaleMapping,
  type IosStatusBar,
  type AndroidStatusBar,
  type ValidationSettings,
  type FailureArtifactSettings,
  type AppResetSettings,
  type Orientation,
} from './types.js';

export { runConfigSchema } from './schema.js';
export { ConfigurationError, PortRangeError, BuildRequiredError } from './errors.js';
export { validateRunConfig, hasLocatorStrategy, type ConfigValidationResult } from './validation.js';
export {
  loadRunConfig,
  parseRunConfig,
  checkRunConfig,
  readRunConfigDocument,
  type RunConfigCheck,
} from './loader.js';
