/**
 * PNG dimension reader
 */

import { readFile } from 'node:fs/promises';
import { PNG } from 'pngjs';
import type { ImageDimensions, ImageInspector } from './types.js';

export class PngImageInspector implements ImageInspector {
  async dimensions(path: string): Promise<ImageDimensions> {
    const buffer = await readFile(path);
    const png = PNG.sync.read(buffer);
    return { width: png.width, height: png.height };
  }
}
