import {
  S3Client,
  CreateBucketCommand,
  HeadBucketCommand,
  PutBucketTaggingCommand,
  PutObjectCommand,
  BucketLocationConstraint
} from '@aws-sdk/client-s3';
import { readFile } from 'fs/promises';
import { PermanentProviderError, errorName, httpStatusCode } from '../errors';

export interface S3Config {
  bucketName: string;
  region?: string;
  tags?: Record<string, string>;
}

export interface UploadResult {
  key: string;
  etag: string;
  url: string;
}

const LOCATION_CONSTRAINTS: readonly string[] = Object.values(BucketLocationConstraint);

function isLocationConstraint(region: string): region is BucketLocationConstraint {
  return LOCATION_CONSTRAINTS.includes(region);
}

export function bucketArn(bucketName: string): string {
  return `arn:aws:s3:::${bucketName}`;
}

export class S3Manager {
  private client: S3Client;
  private region: string;

  constructor(region: string = 'us-east-1', client?: S3Client) {
    this.region = region;
    this.client = client ?? new S3Client({ region });
  }

  /**
   * Create the bucket and return its ARN. A bucket this account already owns
   * is accepted, so a retry after a failed tagging call completes it.
   */
  async createBucket(config: S3Config): Promise<string> {
    const bucketRegion = config.region || this.region;

    // us-east-1 is the default location and must not be sent as a constraint
    let createBucketConfiguration: { LocationConstraint: BucketLocationConstraint } | undefined;
    if (bucketRegion !== 'us-east-1') {
      if (!isLocationConstraint(bucketRegion)) {
        throw new PermanentProviderError(`Region ${bucketRegion} is not a valid S3 bucket location`);
      }
      createBucketConfiguration = { LocationConstraint: bucketRegion };
    }

    try {
      await this.client.send(new CreateBucketCommand({
        Bucket: config.bucketName,
        CreateBucketConfiguration: createBucketConfiguration
      }));
    } catch (error) {
      // Ours already, from an earlier attempt: carry on with the tagging
      if (errorName(error) !== 'BucketAlreadyOwnedByYou') {
        throw error;
      }
    }

    if (config.tags && Object.keys(config.tags).length > 0) {
      await this.client.send(new PutBucketTaggingCommand({
        Bucket: config.bucketName,
        Tagging: {
          TagSet: Object.entries(config.tags).map(([Key, Value]) => ({ Key, Value }))
        }
      }));
    }

    return bucketArn(config.bucketName);
  }

  async bucketExists(bucketName: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucketName }));
      return true;
    } catch (error) {
      const name = errorName(error);
      if (name === 'NotFound' || name === 'NoSuchBucket' || httpStatusCode(error) === 404) {
        return false;
      }
      throw error;
    }
  }

  async uploadFile(bucketName: string, key: string, filePath: string, contentType?: string): Promise<UploadResult> {
    const fileContent = await readFile(filePath);

    const result = await this.client.send(new PutObjectCommand({
      Bucket: bucketName,
      Key: key,
      Body: fileContent,
      ContentType: contentType || this.getContentType(filePath)
    }));

    return {
      key,
      etag: result.ETag || '',
      url: `https://${bucketName}.s3.amazonaws.com/${key}`
    };
  }

  private getContentType(filePath: string): string {
    const ext = filePath.split('.').pop()?.toLowerCase();

    const contentTypes: { [key: string]: string } = {
      'zip': 'application/zip',
      'json': 'application/json',
      'js': 'application/javascript',
      'txt': 'text/plain'
    };

    return contentTypes[ext || ''] || 'application/octet-stream';
  }
}
