import { DeploymentConfig } from '../types';

/**
 * Generated resource names for a stack
 */
export interface ResourceNames {
  /** S3 bucket name for storage and function packages */
  storageBucketName: string;
  /** DynamoDB table name */
  tableName: string;
  /** Lambda function name */
  functionName: string;
  /** API Gateway REST API name */
  apiName: string;
}

/**
 * Resource naming utility class
 */
export class ResourceNamingService {
  private readonly maxS3BucketNameLength = 63;
  private readonly maxTableNameLength = 255;
  private readonly maxLambdaNameLength = 64;
  private readonly maxRoleNameLength = 64;
  private readonly maxApiNameLength = 128;

  /**
   * Generate all resource names for a stack
   */
  generateResourceNames(stackName: string, region: string): ResourceNames {
    const base = this.sanitizeName(stackName);

    return {
      storageBucketName: this.generateS3BucketName(base, region),
      tableName: this.validateAndTruncate(`${base}-table`, this.maxTableNameLength),
      functionName: this.validateAndTruncate(`${base}-function`, this.maxLambdaNameLength),
      apiName: this.validateAndTruncate(`${base}-api`, this.maxApiNameLength)
    };
  }

  /**
   * Fill in every name the configuration does not set yet.
   * Names that are already present are kept, so a persisted config keeps
   * pointing at the same resources.
   */
  deriveNames(config: DeploymentConfig): DeploymentConfig {
    const names = this.generateResourceNames(config.stack_name, config.region);

    return {
      ...config,
      storage_bucket_name: config.storage_bucket_name ?? names.storageBucketName,
      table_name: config.table_name ?? names.tableName,
      function_name: config.function_name ?? names.functionName,
      api_name: config.api_name ?? names.apiName
    };
  }

  /**
   * Whether deriveNames would change the configuration
   */
  hasMissingNames(config: DeploymentConfig): boolean {
    return !config.storage_bucket_name || !config.table_name || !config.function_name || !config.api_name;
  }

  /**
   * IAM role name for the function's execution role
   */
  executionRoleName(functionName: string): string {
    return this.validateAndTruncate(`${functionName}-role`, this.maxRoleNameLength);
  }

  /**
   * Generate S3 bucket name (must be globally unique)
   */
  private generateS3BucketName(base: string, region: string): string {
    const hash = this.generateShortHash(`${base}:${region}`);
    const prefix = base.toLowerCase().substring(0, this.maxS3BucketNameLength - hash.length - '-storage-'.length);
    return `${prefix.replace(/-+$/, '')}-storage-${hash}`;
  }

  /**
   * Sanitize name to be AWS-compliant
   * - Remove invalid characters
   * - Ensure it starts with a letter
   * - Replace consecutive hyphens with single hyphen
   */
  private sanitizeName(name: string): string {
    let sanitized = name.replace(/[^a-zA-Z0-9-]/g, '-');
    sanitized = sanitized.replace(/-+/g, '-');
    sanitized = sanitized.replace(/^-+|-+$/g, '');

    if (sanitized && !/^[a-zA-Z]/.test(sanitized)) {
      sanitized = 'app-' + sanitized;
    }

    if (!sanitized) {
      sanitized = 'app';
    }

    return sanitized;
  }

  /**
   * Truncate name to fit AWS limits, keeping it unique with a hash suffix
   */
  private validateAndTruncate(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    const hash = this.generateShortHash(name);
    const truncatedLength = maxLength - hash.length - 1; // -1 for hyphen
    return name.substring(0, truncatedLength).replace(/-+$/, '') + '-' + hash;
  }

  /**
   * Generate a short hash for uniqueness
   */
  private generateShortHash(input: string): string {
    let hash = 0;
    for (let i = 0; i < input.length; i++) {
      const char = input.charCodeAt(i);
      hash = ((hash << 5) - hash) + char;
      hash = hash & hash; // Convert to 32-bit integer
    }
    return Math.abs(hash).toString(36).substring(0, 6);
  }
}

/**
 * Convenience function to create a new resource naming service
 */
export function createNamingService(): ResourceNamingService {
  return new ResourceNamingService();
}
