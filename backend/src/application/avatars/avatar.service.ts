/**
 * Avatar storage on Cloudinary, plus Gravatar defaults for new accounts
 */

import cloudinaryPackage from 'cloudinary';
import type { UploadApiResponse } from 'cloudinary';
import crypto from 'crypto';
import type { CloudinaryConfig } from '../../config/index.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { callExternal } from '../resilience/retry.utils.js';

const logger = createLogger('avatar-service');

const cloudinary = cloudinaryPackage.v2;

const AVATAR_FOLDER = 'ContactsHub';
const AVATAR_SIZE = 250;

export interface AvatarStorage {
  /** Stores the image under `key` (overwriting) and returns its public URL */
  upload(key: string, data: Buffer): Promise<string>;
}

export class CloudinaryAvatarStorage implements AvatarStorage {
  constructor(private readonly config: CloudinaryConfig) {}

  private uploadBuffer(publicId: string, data: Buffer): Promise<UploadApiResponse> {
    return new Promise((resolve, reject) => {
      const stream = cloudinary.uploader.upload_stream(
        {
          public_id: publicId,
          overwrite: true,
          resource_type: 'image',
          timeout: this.config.timeoutMs,
          cloud_name: this.config.cloudName,
          api_key: this.config.apiKey,
          api_secret: this.config.apiSecret,
        },
        (error, result) => {
          if (error) {
            reject(new Error(error.message, { cause: error }));
            return;
          }
          if (!result) {
            reject(new Error('Cloudinary returned no upload result'));
            return;
          }
          resolve(result);
        }
      );
      stream.end(data);
    });
  }

  async upload(key: string, data: Buffer): Promise<string> {
    const publicId = `${AVATAR_FOLDER}/${key}`;
    const result = await callExternal('cloudinary', () => this.uploadBuffer(publicId, data), {
      timeoutMs: this.config.timeoutMs,
    });

    logger.info({ publicId, version: result.version }, 'Avatar uploaded');

    return cloudinary.url(publicId, {
      cloud_name: this.config.cloudName,
      secure: true,
      width: AVATAR_SIZE,
      height: AVATAR_SIZE,
      crop: 'fill',
      version: result.version,
    });
  }
}

/**
 * Default avatar for an email address
 */
export function gravatarUrl(email: string): string {
  const digest = crypto.createHash('md5').update(email.trim().toLowerCase()).digest('hex');
  return `https://www.gravatar.com/avatar/${digest}?d=identicon`;
}
