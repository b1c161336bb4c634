import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export enum AuditEventType {
  RUN_STARTED = 'RUN_STARTED',
  RUN_COMPLETED = 'RUN_COMPLETED',
  RUN_FAILED = 'RUN_FAILED',
  RUN_DEDUPLICATED = 'RUN_DEDUPLICATED',
  RUN_QUEUED = 'RUN_QUEUED',
  STALE_RUNS_RECONCILED = 'STALE_RUNS_RECONCILED',
  LOOKUP_REBUILT = 'LOOKUP_REBUILT',
  LOOKUP_REBUILD_FAILED = 'LOOKUP_REBUILD_FAILED',
  HISTORICAL_IMPORTED = 'HISTORICAL_IMPORTED',
  ADMIN_ACCESS_DENIED = 'ADMIN_ACCESS_DENIED',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
}

export interface AuditLogEntry {
  timestamp: Date;
  eventType: AuditEventType;
  runId?: string;
  actor?: string;
  ipAddress?: string;
  metadata?: Record<string, unknown>;
  success: boolean;
  message?: string;
}

const SECURITY_EVENTS: ReadonlySet<AuditEventType> = new Set([
  AuditEventType.ADMIN_ACCESS_DENIED,
  AuditEventType.RATE_LIMIT_EXCEEDED,
]);

/**
 * Masks a secret for logging, keeping only its last 4 characters.
 */
export function maskSecret(secret?: string): string {
  if (!secret) return 'N/A';
  if (secret.length <= 4) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Records run, lookup and admin events. One JSON line per event in
 * production, readable output otherwise.
 */
@Injectable()
export class AuditLoggerService {
  private readonly logger = new Logger(AuditLoggerService.name);
  private readonly isProduction: boolean;

  constructor(private configService: ConfigService) {
    this.isProduction = this.configService.get<string>('nodeEnv') === 'production';
  }

  log(entry: AuditLogEntry): void {
    const logData = {
      timestamp: entry.timestamp.toISOString(),
      eventType: entry.eventType,
      runId: entry.runId ?? 'N/A',
      actor: entry.actor ?? 'system',
      ipAddress: entry.ipAddress,
      success: entry.success,
      message: entry.message,
      metadata: entry.metadata,
    };

    if (this.isProduction) {
      this.logger.log(JSON.stringify(logData));
    } else {
      this.logger.log(`[AUDIT] ${entry.eventType}`, logData);
    }

    if (SECURITY_EVENTS.has(entry.eventType) && !entry.success) {
      this.logger.warn(`[SECURITY] ${entry.eventType} - ${entry.message}`, logData);
    }
  }

  logRunStarted(runId: string, inputHash: string, rowCount: number, actor?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.RUN_STARTED,
      runId,
      actor,
      success: true,
      message: `Run started for ${rowCount} rows`,
      metadata: { inputHash, rowCount },
    });
  }

  logRunCompleted(
    runId: string,
    status: string,
    counts: { rowsProcessed: number; rowsFailed: number; rowsInserted: number; rowsUpdated: number },
  ): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.RUN_COMPLETED,
      runId,
      success: status === 'success',
      message: `Run finished with status ${status}`,
      metadata: { status, ...counts },
    });
  }

  logRunFailed(runId: string, reason: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.RUN_FAILED,
      runId,
      success: false,
      message: reason,
    });
  }

  logRunDeduplicated(runId: string, inputHash: string, actor?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.RUN_DEDUPLICATED,
      runId,
      actor,
      success: true,
      message: 'Identical input already processed; returning the earlier run',
      metadata: { inputHash },
    });
  }

  logRunQueued(rowCount: number, actor?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.RUN_QUEUED,
      actor,
      success: true,
      message: `Run queued for ${rowCount} rows`,
      metadata: { rowCount },
    });
  }

  logStaleRunsReconciled(runIds: string[], olderThanMinutes: number): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.STALE_RUNS_RECONCILED,
      success: true,
      message: `Marked ${runIds.length} stale runs as failed`,
      metadata: { runIds, olderThanMinutes },
    });
  }

  logLookupRebuilt(entryCount: number, hash: string, sourceRows: number): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.LOOKUP_REBUILT,
      success: true,
      message: `Historical lookup rebuilt with ${entryCount} entries`,
      metadata: { entryCount, hash, sourceRows },
    });
  }

  logLookupRebuildFailed(reason: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.LOOKUP_REBUILD_FAILED,
      success: false,
      message: reason,
    });
  }

  logHistoricalImported(rowCount: number, actor?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.HISTORICAL_IMPORTED,
      actor,
      success: true,
      message: `Imported ${rowCount} historical standings`,
      metadata: { rowCount },
    });
  }

  logAdminAccessDenied(ipAddress: string, providedKey: string | undefined, reason: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.ADMIN_ACCESS_DENIED,
      ipAddress,
      success: false,
      message: reason,
      metadata: { providedKey: maskSecret(providedKey) },
    });
  }

  logRateLimitExceeded(ipAddress: string, path: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.RATE_LIMIT_EXCEEDED,
      ipAddress,
      success: false,
      message: `Rate limit exceeded on ${path}`,
      metadata: { path },
    });
  }
}
