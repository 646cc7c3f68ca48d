import cloudinary from 'cloudinary';
import type { UploadApiOptions, UploadApiResponse } from 'cloudinary';
import { UploadError, errorMessage } from '@riverwatch/shared';
import type { ChartArtifact } from './renderer.js';

export interface ImageUploader {
  /** Returns a publicly retrievable URL */
  upload(stationCode: string, artifact: ChartArtifact): Promise<string>;
}

export interface CloudinaryCredentials {
  cloudName: string;
  apiKey: string;
  apiSecret: string;
}

/** The part of the Cloudinary SDK the uploader calls */
export interface CloudinaryUploadApi {
  upload(file: string, options?: UploadApiOptions): Promise<UploadApiResponse>;
}

export function publicIdFor(stationCode: string): string {
  return `water_level_station_${stationCode}`;
}

/**
 * Uploads charts to Cloudinary under a stable public id per station, asking
 * for PNG delivery so chat clients can preview the SVG chart.
 */
export class CloudinaryUploader implements ImageUploader {
  private readonly api: CloudinaryUploadApi;

  constructor(credentials: CloudinaryCredentials, api?: CloudinaryUploadApi) {
    if (api) {
      this.api = api;
    } else {
      cloudinary.v2.config({
        cloud_name: credentials.cloudName,
        api_key: credentials.apiKey,
        api_secret: credentials.apiSecret,
        secure: true,
      });
      this.api = cloudinary.v2.uploader;
    }
  }

  async upload(stationCode: string, artifact: ChartArtifact): Promise<string> {
    let result: UploadApiResponse;
    try {
      result = await this.api.upload(artifact.path, {
        public_id: publicIdFor(stationCode),
        overwrite: true,
        invalidate: true,
        format: 'png',
        resource_type: 'image',
      });
    } catch (err) {
      throw new UploadError(`Cloudinary upload failed for station ${stationCode}: ${describeUploadError(err)}`, { cause: err });
    }
    if (typeof result.secure_url !== 'string' || result.secure_url === '') {
      throw new UploadError(`Cloudinary upload for station ${stationCode} returned no secure_url`);
    }
    return result.secure_url;
  }
}

// The SDK rejects with plain objects ({ message, http_code }) as well as Errors
function describeUploadError(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return errorMessage(err);
}
