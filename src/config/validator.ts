import Joi from 'joi';
import { ConfigInvalidError } from '../errors';
import { DeploymentConfig } from '../types';
import { ConfigValidationResult } from './types';

const ROUTE_PATTERN = /^(ANY|GET|POST|PUT|PATCH|DELETE|HEAD|OPTIONS) \/[A-Za-z0-9_\-{}+/.]*$/;

const tagsSchema = Joi.object()
  .pattern(Joi.string(), Joi.string())
  .messages({
    'object.pattern.match': 'Tags must be key-value pairs of strings'
  });

// Joi schema for DeploymentConfig
const deploymentConfigSchema = Joi.object<DeploymentConfig>({
  stack_name: Joi.string()
    .required()
    .pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/)
    .max(64)
    .messages({
      'any.required': 'Stack name is required',
      'string.pattern.base': 'Stack name must start with a letter and contain only alphanumeric characters and hyphens',
      'string.max': 'Stack name must be no more than 64 characters long'
    }),
  region: Joi.string()
    .required()
    .pattern(/^[a-z]{2}(-[a-z]+)+-\d$/)
    .messages({
      'any.required': 'AWS region is required',
      'string.pattern.base': 'AWS region must be a valid region identifier (e.g., us-east-1)'
    }),
  aws_profile: Joi.string().optional(),

  storage_bucket_name: Joi.string()
    .pattern(/^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/)
    .messages({
      'string.pattern.base': 'Storage bucket name must be 3-63 lowercase letters, digits, dots or hyphens'
    }),
  table_name: Joi.string()
    .pattern(/^[a-zA-Z0-9_.-]{3,255}$/)
    .messages({
      'string.pattern.base': 'Table name must be 3-255 letters, digits, underscores, dots or hyphens'
    }),
  function_name: Joi.string()
    .pattern(/^[a-zA-Z0-9_-]{1,64}$/)
    .messages({
      'string.pattern.base': 'Function name must be 1-64 letters, digits, underscores or hyphens'
    }),
  api_name: Joi.string().max(128),

  function_package: Joi.string()
    .pattern(/\.zip$/)
    .messages({
      'string.pattern.base': 'Function package must point to a .zip archive'
    }),
  function_role_arn: Joi.string()
    .pattern(/^arn:aws[a-z-]*:iam::\d{12}:role\/.+$/)
    .messages({
      'string.pattern.base': 'Function role must be an IAM role ARN'
    }),
  function_runtime: Joi.string(),
  function_handler: Joi.string()
    .pattern(/^[a-zA-Z0-9_./-]+\.[a-zA-Z0-9_]+$/)
    .messages({
      'string.pattern.base': 'Handler must be in format "file.function" (e.g., "index.handler")'
    }),
  function_timeout: Joi.number()
    .integer()
    .min(1)
    .max(900)
    .messages({
      'number.min': 'Timeout must be at least 1 second',
      'number.max': 'Timeout must be no more than 900 seconds (15 minutes)'
    }),
  function_memory: Joi.number()
    .integer()
    .min(128)
    .max(10240)
    .messages({
      'number.min': 'Memory must be at least 128 MB',
      'number.max': 'Memory must be no more than 10240 MB'
    }),
  function_environment: Joi.object()
    .pattern(Joi.string().pattern(/^[a-zA-Z][a-zA-Z0-9_]*$/), Joi.string())
    .messages({
      'object.pattern.match': 'Function environment must map variable names to strings'
    }),

  api_routes: Joi.array()
    .items(
      Joi.string().pattern(ROUTE_PATTERN).messages({
        'string.pattern.base': 'Route "{#value}" must look like "GET /items" or "ANY /{proxy+}"'
      })
    )
    .min(1),
  api_stage: Joi.string().pattern(/^[a-zA-Z0-9_]+$/),

  tags: tagsSchema,

  storage_bucket_arn: Joi.string(),
  table_arn: Joi.string(),
  function_arn_or_id: Joi.string(),
  api_id: Joi.string(),
  api_endpoint: Joi.string().uri()
}).unknown(false);

const VALIDATION_OPTIONS: Joi.ValidationOptions = {
  abortEarly: false,
  allowUnknown: false,
  stripUnknown: false
};

/**
 * Validates a deployment configuration object against the schema
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = deploymentConfigSchema.validate(config, VALIDATION_OPTIONS);

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates a deployment configuration and returns it typed.
 * @param source - Where the configuration came from, used in the error message
 * @throws ConfigInvalidError listing every violation if validation fails
 */
export function validateAndNormalizeConfig(config: unknown, source = 'configuration'): DeploymentConfig {
  const { error, value } = deploymentConfigSchema.validate(config, VALIDATION_OPTIONS);

  if (error) {
    throw new ConfigInvalidError(source, error.details.map(detail => detail.message));
  }

  return value;
}

export function getConfigSchema(): Joi.ObjectSchema<DeploymentConfig> {
  return deploymentConfigSchema;
}
