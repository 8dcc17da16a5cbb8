/**
 * Expands a configuration and filters into an ordered run plan
 */

import { join } from 'node:path';
import { createModuleLogger, type Logger } from '../../utils/logger.js';
import { ConfigurationError } from '../run-config/errors.js';
import {
  PLATFORMS,
  PLATFORM_LABELS,
  type AndroidDevice,
  type IosDevice,
  type Platform,
  type RunConfig,
  type ScreenshotPlan,
} from '../run-config/types.js';
import { PortAllocator } from './port-allocator.js';
import { GlobArtifactResolver, type ArtifactResolver } from './artifact-resolver.js';
import {
  MINUTES_PER_JOB,
  type AppOverrides,
  type PlanFilters,
  type RunJob,
  type RunPlan,
} from './types.js';

export interface RunPlanBuilderOptions {
  artifactResolver?: ArtifactResolver;
  logger?: Logger;
}

type DeviceEntry =
  | { platform: 'ios'; device: IosDevice }
  | { platform: 'android'; device: AndroidDevice };

/**
 * Case-insensitive allow-list. Returns undefined when the filter keeps everything.
 */
function toAllowList(filter: readonly string[] | undefined): Set<string> | undefined {
  const values = (filter ?? []).map((v) => v.trim().toLowerCase()).filter((v) => v.length > 0);
  return values.length > 0 ? new Set(values) : undefined;
}

function allows(allowList: Set<string> | undefined, value: string): boolean {
  return !allowList || allowList.has(value.toLowerCase());
}

export class RunPlanBuilder {
  private logger: Logger;
  private artifactResolver?: ArtifactResolver;

  constructor(options: RunPlanBuilderOptions = {}) {
    this.logger = options.logger ?? createModuleLogger('run-plan');
    this.artifactResolver = options.artifactResolver;
  }

  /**
   * Build the plan. Filters are applied before indices are assigned, so
   * job indices are always contiguous.
   */
  async build(
    config: RunConfig,
    outputRoot: string,
    filters: PlanFilters = {},
    portAllocator?: PortAllocator,
    appOverrides: AppOverrides = {}
  ): Promise<RunPlan> {
    const allocator =
      portAllocator ?? new PortAllocator(config.ports.basePort, config.ports.portOffset);
    const resolver = this.artifactResolver ?? new GlobArtifactResolver(config.buildConfig);

    this.logger.info(
      {
        platforms: filters.platforms?.join(',') || 'all',
        devices: filters.devices?.join(',') || 'all',
        languages: filters.languages?.join(',') || 'all',
        screenshots: filters.screenshots?.join(',') || 'all',
      },
      'Building run plan'
    );

    const platforms = this.selectPlatforms(filters.platforms);
    const languages = this.selectLanguages(config, filters.languages);
    const screenshots = this.selectScreenshots(config, filters.screenshots);

    for (const language of languages) {
      if (!config.localeMapping[language]) {
        throw new ConfigurationError(`Language '${language}' has no locale mapping`);
      }
    }

    const devicesByPlatform = new Map<Platform, DeviceEntry[]>();
    for (const platform of platforms) {
      devicesByPlatform.set(platform, this.selectDevices(config, platform, filters.devices));
    }

    const artifactPaths: Partial<Record<Platform, string>> = {};
    for (const platform of platforms) {
      const devices = devicesByPlatform.get(platform) ?? [];
      if (devices.length > 0 && languages.length > 0) {
        artifactPaths[platform] = await resolver.resolve(platform, appOverrides[platform]);
      }
    }

    const jobs: RunJob[] = [];
    for (const platform of platforms) {
      const appPath = artifactPaths[platform];
      if (!appPath) {
        continue;
      }
      for (const language of languages) {
        for (const entry of devicesByPlatform.get(platform) ?? []) {
          jobs.push(this.createJob(entry, language, config, screenshots, outputRoot, appPath, jobs.length, allocator));
        }
      }
    }

    if (jobs.length === 0) {
      throw new ConfigurationError('No jobs match the given filters', 'CONFIGURATION_ERROR', [
        `platforms=${platforms.join(',') || 'none'}`,
        `languages=${languages.join(',') || 'none'}`,
      ]);
    }

    let totalDevices = 0;
    for (const devices of devicesByPlatform.values()) {
      totalDevices += devices.length;
    }

    const plan: RunPlan = {
      jobs,
      totalPlatforms: platforms.length,
      totalDevices,
      totalLanguages: languages.length,
      totalScreenshots: screenshots.length,
      estimatedDurationMinutes: jobs.length * MINUTES_PER_JOB,
      artifactPaths,
    };

    this.logger.info(
      { jobs: jobs.length, platforms: plan.totalPlatforms, languages: plan.totalLanguages },
      'Built run plan'
    );

    return plan;
  }

  private createJob(
    entry: DeviceEntry,
    language: string,
    config: RunConfig,
    screenshots: readonly ScreenshotPlan[],
    outputRoot: string,
    appPath: string,
    index: number,
    allocator: PortAllocator
  ): RunJob {
    const base = {
      index,
      language,
      localeMapping: config.localeMapping[language],
      screenshots,
      outputDirectory: join(outputRoot, PLATFORM_LABELS[entry.platform], entry.device.folder, language),
      ports: allocator.allocate(index),
      appPath,
      deviceName: entry.device.name,
      deviceFolder: entry.device.folder,
    };

    if (entry.platform === 'ios') {
      return { ...base, platform: 'ios', iosDevice: entry.device, androidDevice: null };
    }
    return { ...base, platform: 'android', iosDevice: null, androidDevice: entry.device };
  }

  private selectPlatforms(filter: readonly string[] | undefined): Platform[] {
    const allowList = toAllowList(filter);
    return PLATFORMS.filter((platform) => allows(allowList, platform));
  }

  private selectLanguages(config: RunConfig, filter: readonly string[] | undefined): string[] {
    const allowList = toAllowList(filter);
    return config.languages.filter((language) => allows(allowList, language));
  }

  private selectScreenshots(config: RunConfig, filter: readonly string[] | undefined): ScreenshotPlan[] {
    const allowList = toAllowList(filter);
    return config.screenshots.filter((plan) => allows(allowList, plan.name));
  }

  private selectDevices(config: RunConfig, platform: Platform, filter: readonly string[] | undefined): DeviceEntry[] {
    const allowList = toAllowList(filter);
    if (platform === 'ios') {
      return config.devices.ios
        .filter((device) => allows(allowList, device.name))
        .map((device): DeviceEntry => ({ platform: 'ios', device }));
    }
    return config.devices.android
      .filter((device) => allows(allowList, device.name))
      .map((device): DeviceEntry => ({ platform: 'android', device }));
  }
}

/**
 * Build a plan with the default port allocator and artifact resolver
 */
export function buildPlan(
  config: RunConfig,
  outputRoot: string,
  filters: PlanFilters = {},
  appOverrides: AppOverrides = {},
  options: RunPlanBuilderOptions = {}
): Promise<RunPlan> {
  return new RunPlanBuilder(options).build(config, outputRoot, filters, undefined, appOverrides);
}
