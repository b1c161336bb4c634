import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BlenderPolicy, CONFEDERATIONS } from '../../qualification/types/qualification.types';

export interface ConfigValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Configuration Validation Service
 *
 * Checks the loaded configuration at startup. Errors abort the boot;
 * warnings are only logged.
 */
@Injectable()
export class ConfigValidationService {
  private readonly logger = new Logger(ConfigValidationService.name);

  constructor(private configService: ConfigService) {}

  /**
   * @throws Error when any configuration error was found
   */
  validate(): ConfigValidationResult {
    this.logger.log('Validating configuration...');
    const result: ConfigValidationResult = { errors: [], warnings: [] };

    this.validateDatabase(result);
    this.validateRedis(result);
    this.validateRabbitMQ(result);
    this.validateBlender(result);
    this.validateRuns(result);
    this.validateAdmin(result);

    if (result.errors.length > 0) {
      this.logger.error('Configuration validation failed:');
      result.errors.forEach((error) => this.logger.error(`  - ${error}`));
      throw new Error(`Configuration validation failed: ${result.errors.join('; ')}`);
    }

    if (result.warnings.length > 0) {
      this.logger.warn('Configuration warnings:');
      result.warnings.forEach((warning) => this.logger.warn(`  - ${warning}`));
    }

    this.logger.log('Configuration validation passed');
    return result;
  }

  private validateDatabase({ errors, warnings }: ConfigValidationResult): void {
    const host = this.configService.get<string>('database.host');
    const port = this.configService.get<number>('database.port');
    const username = this.configService.get<string>('database.username');
    const password = this.configService.get<string>('database.password');
    const database = this.configService.get<string>('database.database');
    const poolSize = this.configService.get<number>('database.poolSize');

    if (!host) errors.push('DATABASE_HOST is required but missing');
    if (!isPort(port)) errors.push('DATABASE_PORT must be a valid port number (1-65535)');
    if (!username) errors.push('DATABASE_USERNAME is required but missing');
    if (!password) warnings.push('DATABASE_PASSWORD is not set');
    if (!database) errors.push('DATABASE_NAME is required but missing');
    if (poolSize !== undefined && (poolSize < 1 || poolSize > 100)) {
      errors.push('DATABASE_POOL_SIZE must be between 1 and 100');
    }
  }

  private validateRedis({ errors, warnings }: ConfigValidationResult): void {
    const host = this.configService.get<string>('redis.host');
    const port = this.configService.get<number>('redis.port');
    const ttl = this.configService.get<number>('historical.cacheTtlSeconds');

    if (!host) errors.push('REDIS_HOST is required but missing');
    if (!isPort(port)) errors.push('REDIS_PORT must be a valid port number (1-65535)');
    if (!this.configService.get<string>('redis.password')) {
      warnings.push('REDIS_PASSWORD is not set (authentication disabled)');
    }
    if (ttl !== undefined && ttl < 1) {
      errors.push('HISTORICAL_LOOKUP_CACHE_TTL must be at least 1 second');
    }
  }

  private validateRabbitMQ({ errors }: ConfigValidationResult): void {
    const url = this.configService.get<string>('rabbitmq.url');
    const queue = this.configService.get<string>('rabbitmq.queue');
    const prefetchCount = this.configService.get<number>('rabbitmq.prefetchCount');
    const maxRetries = this.configService.get<number>('rabbitmq.maxRetries');

    if (!url) {
      errors.push('RABBITMQ_URL is required but missing (example: amqp://localhost:5672)');
    } else if (!url.startsWith('amqp://') && !url.startsWith('amqps://')) {
      errors.push('RABBITMQ_URL must start with amqp:// or amqps://');
    }
    if (!queue || queue.trim() === '') errors.push('RABBITMQ_QUEUE is required but missing');
    if (prefetchCount !== undefined && (prefetchCount < 1 || prefetchCount > 1000)) {
      errors.push('RABBITMQ_PREFETCH_COUNT must be between 1 and 1000');
    }
    if (maxRetries !== undefined && maxRetries < 1) {
      errors.push('RABBITMQ_MAX_RETRIES must be at least 1');
    }
  }

  private validateBlender({ errors }: ConfigValidationResult): void {
    const policy = this.configService.get<BlenderPolicy>('blender');
    if (!policy) return;

    const { formWeight, historicalWeight, formFactorWeights } = policy;
    if (formWeight < 0 || historicalWeight < 0) {
      errors.push('BLENDER_FORM_WEIGHT and BLENDER_HISTORICAL_WEIGHT cannot be negative');
    } else if (formWeight + historicalWeight <= 0) {
      errors.push('BLENDER_FORM_WEIGHT and BLENDER_HISTORICAL_WEIGHT cannot both be 0');
    }

    const factorWeights = [formFactorWeights.rank, formFactorWeights.pointsPerGame, formFactorWeights.goalDiff];
    if (factorWeights.some((weight) => weight < 0)) {
      errors.push('Form factor weights cannot be negative');
    } else if (factorWeights.every((weight) => weight === 0)) {
      errors.push('At least one form factor weight must be positive');
    }

    if (
      policy.minProbability < 0 ||
      policy.maxProbability > 100 ||
      policy.minProbability > policy.maxProbability
    ) {
      errors.push('BLENDER_MIN_PROBABILITY and BLENDER_MAX_PROBABILITY must satisfy 0 <= min <= max <= 100');
    }

    for (const confederation of CONFEDERATIONS) {
      const multiplier = policy.confederationMultipliers[confederation];
      if (!(multiplier >= 0)) {
        errors.push(`Confederation multiplier for ${confederation} must be a non-negative number`);
      }
    }

    if (!policy.modelVersion) errors.push('BLENDER_MODEL_VERSION cannot be empty');
  }

  private validateRuns({ errors }: ConfigValidationResult): void {
    const staleAfter = this.configService.get<number>('runs.staleAfterMinutes');
    if (staleAfter !== undefined && staleAfter < 1) {
      errors.push('RUN_STALE_AFTER_MINUTES must be at least 1');
    }
  }

  private validateAdmin({ errors, warnings }: ConfigValidationResult): void {
    const apiKey = this.configService.get<string>('admin.apiKey');
    const isProduction = this.configService.get<string>('nodeEnv') === 'production';

    if (!apiKey) {
      warnings.push('ADMIN_API_KEY is not set; admin endpoints will refuse every request');
    } else if (isProduction && apiKey.length < 16) {
      errors.push('ADMIN_API_KEY must be at least 16 characters in production');
    }
  }
}

function isPort(value: number | undefined): boolean {
  return value !== undefined && Number.isInteger(value) && value >= 1 && value <= 65535;
}
