/**
 * Sharp-based image adapter for frame splitting and OCR preprocessing.
 */

import sharp from 'sharp';
import type { ImageProcessorPort, ImageRegions } from '../../core/image/ImageProcessorPort';
import { createLogger } from '../../utils/logger';
import { toErrorMessage } from '../../utils/errors';

const logger = createLogger('sharp-imageio');

export interface SharpImageOptions {
  /** Regions shorter than this are upscaled before OCR. */
  minOcrHeight: number;
  maxDimension: number;
}

const DEFAULT_OPTIONS: SharpImageOptions = {
  minOcrHeight: 64,
  maxDimension: 4096,
};

export class SharpImageProcessor implements ImageProcessorPort {
  private readonly options: SharpImageOptions;

  constructor(options: Partial<SharpImageOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async splitRegions(image: Buffer, titleFraction: number): Promise<ImageRegions> {
    const metadata = await sharp(image).metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error('Invalid frame dimensions');
    }
    if (metadata.width > this.options.maxDimension || metadata.height > this.options.maxDimension) {
      throw new Error(
        `Frame too large: ${metadata.width}x${metadata.height} exceeds ${this.options.maxDimension}px limit`
      );
    }

    const { width, height } = metadata;
    const titleHeight = Math.min(height - 1, Math.max(1, Math.round(height * titleFraction)));

    const [title, price] = await Promise.all([
      sharp(image).extract({ left: 0, top: 0, width, height: titleHeight }).png().toBuffer(),
      sharp(image)
        .extract({ left: 0, top: titleHeight, width, height: height - titleHeight })
        .png()
        .toBuffer(),
    ]);

    return { title, price };
  }

  async prepareForOcr(image: Buffer): Promise<Buffer> {
    try {
      let pipeline = sharp(image, { sequentialRead: true });
      const metadata = await pipeline.metadata();

      if (metadata.height && metadata.height < this.options.minOcrHeight) {
        pipeline = pipeline.resize({
          height: this.options.minOcrHeight,
          kernel: sharp.kernel.lanczos3,
        });
      }

      // grayscale + contrast stretch, light denoise
      return await pipeline.grayscale().normalize().median(1).png().toBuffer();
    } catch (error) {
      logger.warn('OCR preprocessing failed; using raw buffer', { error: toErrorMessage(error) });
      return image;
    }
  }
}
