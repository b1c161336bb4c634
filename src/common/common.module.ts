import { Module } from '@nestjs/common';
import { AdminApiKeyGuard } from './guards/admin-api-key.guard';
import { RateLimitingGuard } from './guards/rate-limiting.guard';
import { MetricsGuard } from './guards/metrics.guard';
import { AuditLoggerService } from './services/audit-logger.service';
import { MetricsService } from './services/metrics.service';
import { ConfigValidationService } from './config/config-validation.service';

@Module({
  providers: [
    AdminApiKeyGuard,
    RateLimitingGuard,
    MetricsGuard,
    AuditLoggerService,
    MetricsService,
    ConfigValidationService,
  ],
  exports: [
    AdminApiKeyGuard,
    RateLimitingGuard,
    MetricsGuard,
    AuditLoggerService,
    MetricsService,
    ConfigValidationService,
  ],
})
export class CommonModule {}
