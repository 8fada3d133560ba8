/**
 * Image Preparation Service
 * Shrinks a captured photo to an upload-sized JPEG using sharp
 */

import sharp from 'sharp';
import { errorMessage } from '@moodlens/platform-core';
import { getLogger } from '../../config/service-config';
import type { IImagePreparer, ImagePreparationOptions, PreparedImage } from '../../domains/ports';
import { CheckInError } from '../../application/errors';

const logger = getLogger('image-preparation-service');

export interface ImagePreparationConfig {
  maxDimension?: number;
  maxBytes?: number;
  initialQuality?: number;
  minQuality?: number;
  qualityStep?: number;
}

const DEFAULT_CONFIG: Required<ImagePreparationConfig> = {
  maxDimension: 512,
  maxBytes: 500 * 1024,
  initialQuality: 80,
  minQuality: 10,
  qualityStep: 10,
};

export class ImagePreparationService implements IImagePreparer {
  private readonly config: Required<ImagePreparationConfig>;

  constructor(config: ImagePreparationConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Fit inside maxDimension x maxDimension, then lower JPEG quality one step at
   * a time until the payload fits or the quality floor is reached.
   */
  async prepare(image: Buffer, options: ImagePreparationOptions = {}): Promise<PreparedImage> {
    const maxBytes = options.maxBytes ?? this.config.maxBytes;
    const { initialQuality, minQuality, qualityStep } = this.config;

    try {
      let quality = initialQuality;
      let encoded = await this.encode(image, quality);

      while (encoded.data.length > maxBytes && quality > minQuality) {
        quality = Math.max(minQuality, quality - qualityStep);
        encoded = await this.encode(image, quality);
      }

      const prepared: PreparedImage = {
        data: encoded.data,
        width: encoded.info.width,
        height: encoded.info.height,
        quality,
        byteLength: encoded.data.length,
        withinLimit: encoded.data.length <= maxBytes,
      };

      if (!prepared.withinLimit) {
        logger.warn('Prepared image still exceeds size ceiling', {
          byteLength: prepared.byteLength,
          maxBytes,
          quality,
        });
      }

      return prepared;
    } catch (error) {
      logger.error('Failed to prepare image', { error: errorMessage(error), originalSize: image.length });
      throw CheckInError.imagePreparationFailed(errorMessage(error), error instanceof Error ? error : undefined);
    }
  }

  private encode(image: Buffer, quality: number): Promise<{ data: Buffer; info: sharp.OutputInfo }> {
    return sharp(image)
      .rotate()
      .resize(this.config.maxDimension, this.config.maxDimension, {
        fit: 'inside',
        withoutEnlargement: true,
      })
      .jpeg({ quality, mozjpeg: true })
      .toBuffer({ resolveWithObject: true });
  }
}
