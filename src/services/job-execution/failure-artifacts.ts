/**
 * Diagnostics captured once when a job fails
 */

import { mkdir, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '../../utils/logger.js';
import type { AutomationSession } from '../driver-session/types.js';
import type { FailureArtifactSettings } from '../run-config/types.js';
import { errorMessage } from './errors.js';
import type { PlatformAdapter } from './platform-adapter.js';
import type { FailureArtifact, FailureArtifactKind } from './types.js';

export const FAILURE_ARTIFACT_FILES: Record<FailureArtifactKind, string> = {
  PageSource: 'page_source.xml',
  Screenshot: 'failure_screenshot.png',
  DeviceLogs: 'device_logs.txt',
};

export interface FailureArtifactContext {
  outputDirectory: string;
  settings: FailureArtifactSettings;
  adapter: PlatformAdapter;
  /** Absent when the job failed before a session existed */
  session?: AutomationSession;
  logger: Logger;
}

/**
 * Capture page source, a last screenshot and device logs. Each capture is
 * independent; one that fails is logged at debug and left out.
 */
export async function captureFailureArtifacts(context: FailureArtifactContext): Promise<FailureArtifact[]> {
  const { settings, adapter, session, logger } = context;
  const device = adapter.device;
  const directory = join(context.outputDirectory, settings.artifactsDir);
  const artifacts: FailureArtifact[] = [];

  const attempt = async (kind: FailureArtifactKind, write: (path: string) => Promise<void>): Promise<void> => {
    const path = join(directory, FAILURE_ARTIFACT_FILES[kind]);
    try {
      await mkdir(directory, { recursive: true });
      await write(path);
      const { size } = await stat(path);
      artifacts.push({ kind, path, timestamp: new Date(), sizeBytes: size });
      logger.info({ kind, path }, 'Saved failure artifact');
    } catch (error) {
      logger.debug({ kind, error: errorMessage(error) }, 'Failure artifact not captured');
    }
  };

  if (settings.savePageSource && session) {
    await attempt('PageSource', async (path) => writeFile(path, await session.getPageSource(), 'utf8'));
  }

  if (device) {
    if (settings.saveScreenshot) {
      await attempt('Screenshot', (path) => adapter.screenshot(device, path));
    }
    if (settings.saveDeviceLogs) {
      await attempt('DeviceLogs', async (path) => writeFile(path, await adapter.captureLogs(device), 'utf8'));
    }
  }

  return artifacts;
}
