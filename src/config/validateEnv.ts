// Environment validation - fail fast on startup
import { env, isReportSymbols } from './env';
import type { EnvConfig } from './env';
import { logger } from '../utils/logger';
import { ValidationError } from '../utils/errors';

interface ValidationRule {
  name: keyof EnvConfig;
  required: boolean;
  validator?: (value: string) => boolean;
  message?: string;
}

const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'];

const validationRules: ValidationRule[] = [
  {
    name: 'LOG_LEVEL',
    required: false,
    validator: (v) => LOG_LEVELS.includes(v.toUpperCase()),
    message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`
  },
  {
    name: 'REPORT_SYMBOLS',
    required: false,
    validator: isReportSymbols,
    message: 'REPORT_SYMBOLS must be one of auto, unicode, ascii'
  },
];

export function validateEnvironment(config: EnvConfig = env): void {
  logger.debug('Validating environment variables...');

  const errors: string[] = [];

  for (const rule of validationRules) {
    const value = config[rule.name];

    if (rule.required && !value) {
      errors.push(`Missing required environment variable: ${rule.name}`);
      continue;
    }

    if (value && rule.validator && !rule.validator(value)) {
      errors.push(rule.message || `Invalid value for ${rule.name}: ${value}`);
    }
  }

  if (errors.length > 0) {
    logger.error('Environment validation failed', undefined, { errors });
    throw new ValidationError('Environment validation failed', errors);
  }

  logger.debug('Environment validation passed');
}
