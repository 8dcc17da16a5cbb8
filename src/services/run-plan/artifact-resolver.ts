/**
 * Resolves the application artifact installed by each job
 */

import fg from 'fast-glob';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { createModuleLogger } from '../../utils/logger.js';
import { BuildRequiredError } from '../run-config/errors.js';
import { PLATFORM_LABELS, type Platform, type RunConfig } from '../run-config/types.js';

const logger = createModuleLogger('run-plan:artifacts');

/**
 * Build resolver contract. Building the application is out of scope;
 * a resolver only locates something already built.
 */
export interface ArtifactResolver {
  resolve(platform: Platform, overridePath?: string): Promise<string>;
}

const OVERRIDE_FLAGS: Record<Platform, string> = {
  ios: '--ios-app',
  android: '--android-app',
};

/**
 * Resolves CLI overrides first, then the newest match of the configured
 * artifact glob
 */
export class GlobArtifactResolver implements ArtifactResolver {
  constructor(
    private buildConfig: RunConfig['buildConfig'],
    private cwd: string = process.cwd()
  ) {}

  async resolve(platform: Platform, overridePath?: string): Promise<string> {
    const label = PLATFORM_LABELS[platform];

    if (overridePath) {
      const fullPath = resolve(this.cwd, overridePath);
      if (!(await pathExists(fullPath))) {
        throw new BuildRequiredError(`${label} app '${overridePath}' does not exist`, platform);
      }
      logger.debug({ platform, path: fullPath }, 'Using app override');
      return fullPath;
    }

    const pattern = this.buildConfig[platform]?.artifactGlob;
    if (pattern) {
      const newest = await this.findNewest(pattern);
      if (newest) {
        logger.info({ platform, path: newest }, 'Resolved app artifact');
        return newest;
      }
      logger.warn({ platform, pattern }, 'Artifact glob matched nothing');
    }

    throw new BuildRequiredError(
      `No ${label} app artifact found. Build the app first or pass ${OVERRIDE_FLAGS[platform]} <path>`,
      platform
    );
  }

  private async findNewest(pattern: string): Promise<string | undefined> {
    // .app bundles are directories, so directories match as well
    const matches = await fg(pattern, {
      cwd: this.cwd,
      absolute: true,
      onlyFiles: false,
      dot: false,
      caseSensitiveMatch: false,
    });

    let newest: { path: string; mtimeMs: number } | undefined;
    for (const match of matches) {
      // A match can vanish or be a dangling link by the time it is read
      const info = await stat(match).catch((error: unknown) => {
        logger.debug(
          { path: match, error: error instanceof Error ? error.message : String(error) },
          'Skipping unreadable match'
        );
        return undefined;
      });
      if (!info) {
        continue;
      }
      if (!newest || info.mtimeMs > newest.mtimeMs) {
        newest = { path: match, mtimeMs: info.mtimeMs };
      }
    }
    return newest?.path;
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}
