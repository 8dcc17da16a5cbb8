/**
 * Zod schema for the run configuration file.
 *
 * The file uses snake_case keys; every object is transformed into the
 * camelCase shape the rest of the code works with.
 */

import { z } from 'zod';

const nonEmpty = z.string().trim().min(1);

export const selectorSchema = z
  .object({
    accessibility_id: z.string().optional(),
    id: z.string().optional(),
    ios_class_chain: z.string().optional(),
    android_uiautomator: z.string().optional(),
    xpath: z.string().optional(),
  })
  .strict()
  .transform((s) => ({
    accessibilityId: s.accessibility_id,
    id: s.id,
    iosClassChain: s.ios_class_chain,
    androidUiautomator: s.android_uiautomator,
    xpath: s.xpath,
  }));

const tapActionSchema = z
  .object({ tap: selectorSchema })
  .strict()
  .transform((a) => ({ type: 'tap' as const, selector: a.tap }));

const waitActionSchema = z
  .object({ wait: z.object({ seconds: z.number().nonnegative().optional() }).strict() })
  .strict()
  .transform((a) => ({ type: 'wait' as const, seconds: a.wait.seconds }));

const waitForActionSchema = z
  .object({
    wait_for: z
      .object({
        selector: selectorSchema,
        timeout_ms: z.number().int().positive().optional(),
      })
      .strict(),
  })
  .strict()
  .transform((a) => ({
    type: 'wait_for' as const,
    selector: a.wait_for.selector,
    timeoutMs: a.wait_for.timeout_ms,
  }));

const captureActionSchema = z
  .object({ capture: z.object({ name: nonEmpty }).strict() })
  .strict()
  .transform((a) => ({ type: 'capture' as const, name: a.capture.name }));

export const screenshotActionSchema = z.union([
  tapActionSchema,
  waitActionSchema,
  waitForActionSchema,
  captureActionSchema,
]);

const platformSelectorsSchema = z
  .object({
    ios: selectorSchema.optional(),
    android: selectorSchema.optional(),
  })
  .strict();

export const screenshotPlanSchema = z
  .object({
    name: nonEmpty,
    orientation: z.string().optional(),
    actions: z.array(screenshotActionSchema).default([]),
    assert: platformSelectorsSchema.optional(),
  })
  .strict();

const iosDeviceSchema = z
  .object({
    name: nonEmpty,
    udid: z.string().optional(),
    folder: nonEmpty,
    platform_version: nonEmpty,
  })
  .strict()
  .transform((d) => ({
    name: d.name,
    udid: d.udid,
    folder: d.folder,
    platformVersion: d.platform_version,
  }));

const androidDeviceSchema = z
  .object({
    name: nonEmpty,
    avd: z.string(),
    folder: nonEmpty,
    platform_version: nonEmpty,
  })
  .strict()
  .transform((d) => ({
    name: d.name,
    avd: d.avd,
    folder: d.folder,
    platformVersion: d.platform_version,
  }));

const localeMappingSchema = z.object({ ios: z.string(), android: z.string() }).strict();

const platformBuildSchema = z
  .object({
    artifact_glob: z.string().optional(),
    package: z.string().optional(),
  })
  .strict()
  .transform((b) => ({ artifactGlob: b.artifact_glob, package: b.package }));

const dimensionsSchema = z.tuple([z.number().int().positive(), z.number().int().positive()]);

const deviceSizeSchema = z
  .object({
    portrait: dimensionsSchema.optional(),
    landscape: dimensionsSchema.optional(),
  })
  .strict();

const capabilityMapSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const runConfigSchema = z
  .object({
    devices: z
      .object({
        ios: z.array(iosDeviceSchema).default([]),
        android: z.array(androidDeviceSchema).default([]),
      })
      .strict(),
    languages: z.array(nonEmpty).min(1, 'at least one language is required'),
    locale_mapping: z.record(localeMappingSchema),
    screenshots: z.array(screenshotPlanSchema).min(1, 'at least one screenshot plan is required'),
    build_config: z
      .object({
        ios: platformBuildSchema.optional(),
        android: platformBuildSchema.optional(),
      })
      .strict()
      .optional(),
    timeouts: z
      .object({
        default_wait_ms: z.number().int().positive().optional(),
        implicit_wait_ms: z.number().int().positive().optional(),
        page_load_timeout_ms: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    ports: z
      .object({
        base_port: z.number().int().optional(),
        port_offset: z.number().int().optional(),
        emulator_start_port: z.number().int().positive().optional(),
        emulator_end_port: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    app_reset: z
      .object({
        policy: z.enum(['never', 'on_language_change', 'always']).optional(),
        clear_data_on_language_change: z.boolean().optional(),
      })
      .strict()
      .optional(),
    failure_artifacts: z
      .object({
        save_page_source: z.boolean().optional(),
        save_screenshot: z.boolean().optional(),
        save_device_logs: z.boolean().optional(),
        artifacts_dir: z.string().optional(),
      })
      .strict()
      .optional(),
    status_bar: z
      .object({
        ios: z
          .object({
            time: z.string().optional(),
            wifi_bars: z.number().int().min(0).max(3).optional(),
            cellular_bars: z.number().int().min(0).max(4).optional(),
            battery_state: z.enum(['charging', 'charged', 'discharging']).optional(),
          })
          .strict()
          .optional(),
        android: z
          .object({
            demo_mode: z.boolean().optional(),
            clock: z.string().optional(),
            battery: z.number().int().min(0).max(100).optional(),
            wifi: z.string().optional(),
            notifications: z.boolean().optional(),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    validation: z
      .object({
        enforce_image_size: z.boolean().optional(),
        expected_sizes: z
          .object({
            ios: z.record(deviceSizeSchema).optional(),
            android: z.record(deviceSizeSchema).optional(),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    capabilities: z
      .object({
        ios: capabilityMapSchema.optional(),
        android: capabilityMapSchema.optional(),
      })
      .strict()
      .optional(),
    dismissors: z
      .object({
        ios: z.array(selectorSchema).optional(),
        android: z.array(selectorSchema).optional(),
      })
      .strict()
      .optional(),
  })
  .transform((c) => ({
    devices: c.devices,
    languages: c.languages,
    localeMapping: c.locale_mapping,
    screenshots: c.screenshots,
    buildConfig: c.build_config ?? {},
    timeouts: {
      defaultWaitMs: c.timeouts?.default_wait_ms,
      implicitWaitMs: c.timeouts?.implicit_wait_ms,
      pageLoadTimeoutMs: c.timeouts?.page_load_timeout_ms,
    },
    ports: {
      basePort: c.ports?.base_port,
      portOffset: c.ports?.port_offset,
      emulatorStartPort: c.ports?.emulator_start_port,
      emulatorEndPort: c.ports?.emulator_end_port,
    },
    appReset: {
      policy: c.app_reset?.policy ?? 'never',
      clearDataOnLanguageChange: c.app_reset?.clear_data_on_language_change ?? true,
    },
    failureArtifacts: {
      savePageSource: c.failure_artifacts?.save_page_source ?? true,
      saveScreenshot: c.failure_artifacts?.save_screenshot ?? true,
      saveDeviceLogs: c.failure_artifacts?.save_device_logs ?? true,
      artifactsDir: c.failure_artifacts?.artifacts_dir ?? 'failure_artifacts',
    },
    statusBar: {
      ios: c.status_bar?.ios && {
        time: c.status_bar.ios.time,
        wifiBars: c.status_bar.ios.wifi_bars,
        cellularBars: c.status_bar.ios.cellular_bars,
        batteryState: c.status_bar.ios.battery_state,
      },
      android: c.status_bar?.android && {
        demoMode: c.status_bar.android.demo_mode ?? true,
        clock: c.status_bar.android.clock,
        battery: c.status_bar.android.battery,
        wifi: c.status_bar.android.wifi,
        notifications: c.status_bar.android.notifications,
      },
    },
    validation: c.validation && {
      enforceImageSize: c.validation.enforce_image_size ?? false,
      expectedSizes: c.validation.expected_sizes ?? {},
    },
    capabilities: c.capabilities ?? {},
    dismissors: c.dismissors ?? {},
  }));
