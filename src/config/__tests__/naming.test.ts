import { describe, it, expect, beforeEach } from 'vitest';
import { DeploymentConfig } from '../../types';
import { createNamingService, ResourceNamingService } from '../naming';

describe('Resource Naming Service', () => {
  let namingService: ResourceNamingService;

  beforeEach(() => {
    namingService = new ResourceNamingService();
  });

  describe('generateResourceNames', () => {
    it('should derive every resource name from the stack name', () => {
      expect(namingService.generateResourceNames('demo', 'us-east-1')).toEqual({
        storageBucketName: 'demo-storage-4u48yv',
        tableName: 'demo-table',
        functionName: 'demo-function',
        apiName: 'demo-api'
      });
    });

    it('should lowercase the bucket name only', () => {
      const names = namingService.generateResourceNames('My-App', 'us-east-1');

      expect(names.storageBucketName).toBe('my-app-storage-a92uiy');
      expect(names.tableName).toBe('My-App-table');
    });

    it('should make the bucket name depend on the region', () => {
      expect(namingService.generateResourceNames('demo', 'eu-west-1').storageBucketName).toBe('demo-storage-skz0jr');
    });

    it('should sanitize invalid characters', () => {
      expect(namingService.generateResourceNames('my_app.v2', 'us-east-1').tableName).toBe('my-app-v2-table');
      expect(namingService.generateResourceNames('123app', 'us-east-1').tableName).toBe('app-123app-table');
      expect(namingService.generateResourceNames('!!!', 'us-east-1').tableName).toBe('app-table');
    });

    it('should truncate long names with a hash suffix', () => {
      const names = namingService.generateResourceNames('a'.repeat(70), 'us-east-1');

      expect(names.functionName).toBe(`${'a'.repeat(57)}-e28cwr`);
      expect(names.storageBucketName.length).toBeLessThanOrEqual(63);
      expect(names.storageBucketName).toMatch(/^a+-storage-[a-z0-9]+$/);
    });
  });

  describe('deriveNames', () => {
    it('should fill only the absent names', () => {
      const config: DeploymentConfig = { stack_name: 'demo', region: 'us-east-1', table_name: 'custom-table' };

      const named = namingService.deriveNames(config);

      expect(named).toEqual({
        stack_name: 'demo',
        region: 'us-east-1',
        storage_bucket_name: 'demo-storage-4u48yv',
        table_name: 'custom-table',
        function_name: 'demo-function',
        api_name: 'demo-api'
      });
      expect(config.function_name).toBeUndefined();
    });

    it('should report whether any name is missing', () => {
      const config: DeploymentConfig = { stack_name: 'demo', region: 'us-east-1' };

      expect(namingService.hasMissingNames(config)).toBe(true);
      expect(namingService.hasMissingNames(namingService.deriveNames(config))).toBe(false);
    });
  });

  describe('executionRoleName', () => {
    it('should append the role suffix', () => {
      expect(createNamingService().executionRoleName('demo-function')).toBe('demo-function-role');
    });
  });
});
