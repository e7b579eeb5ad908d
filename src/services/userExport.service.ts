import { mkdir, writeFile, appendFile, rm, stat } from 'fs/promises';
import { join, resolve } from 'path';
import { ulid } from 'ulid';
import { stringify } from 'csv-stringify/sync';
import { env } from '@/config/env';
import { EXPORT_RULES } from '@/config/businessRules';
import { NotFoundError, ValidationError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { IEventBus, BusEvent, EventPayload } from '@/events/EventBus';
import { IJobQueue, Job, JobStatus } from '@/jobs/JobQueue';
import { AppJobs, ExportField, UserExportJob } from '@/jobs/jobs';
import { IUserRepository, ExportUserRow } from '@/repositories/interfaces';
import { formatIsoDate } from '@/utils/dates';
import { ProgressWatchdog } from '@/utils/progressWatchdog';

const logger = createLogger('UserExportService');

export const EXPORT_EVENTS = {
  PROGRESS: 'user_export:progress',
  COMPLETE: 'user_export:complete',
  FAILED: 'user_export:failed',
} as const;

export const EXPORT_COLUMN_LABELS: Record<ExportField, string> = {
  id: 'User ID',
  email: 'Email',
  first_name: 'First Name',
  last_name: 'Last Name',
  phone_number: 'Phone Number',
  state: 'Account State',
};

const EXPORT_FILE_PATTERN = new RegExp(
  `^${EXPORT_RULES.FILE_PREFIX}-\\d{4}-\\d{2}-\\d{2}-[0-9A-HJKMNP-TV-Z]{26}\\.csv$`
);

const EXPORT_FAILED_MESSAGE = 'Failed to export Users to CSV';

export function exportTopic(adminId: string): string {
  return `exporter:${adminId}`;
}

export function exportFileName(date: Date, id: string = ulid()): string {
  return `${EXPORT_RULES.FILE_PREFIX}-${formatIsoDate(date)}-${id}.csv`;
}

function exportValue(row: ExportUserRow, field: ExportField): string {
  switch (field) {
    case 'id':
      return row.id;
    case 'email':
      return row.email;
    case 'first_name':
      return row.firstName ?? '';
    case 'last_name':
      return row.lastName ?? '';
    case 'phone_number':
      return row.phoneNumber ?? '';
    case 'state':
      return row.state;
  }
}

interface ExportRecord {
  adminId: string;
  lastEvent: BusEvent | null;
}

export interface ExportStatus {
  jobId: string;
  status: JobStatus;
  attempts: number;
  createdAt: Date;
  finishedAt: Date | null;
  lastEvent: BusEvent | null;
}

/**
 * User Export Service
 * Member CSV exports run as background jobs and report progress on the
 * exporter:<adminId> topic.
 */
export class UserExportService {
  private exports = new Map<string, ExportRecord>();

  constructor(
    private userRepo: IUserRepository,
    private jobQueue: IJobQueue<AppJobs>,
    private eventBus: IEventBus,
    private exportDir: string = env.EXPORT_DIR,
    private progressTimeoutMs: number = EXPORT_RULES.PROGRESS_TIMEOUT_MS
  ) {
    this.jobQueue.onEvicted((job) => this.forgetExport(job.id));
  }

  startExport(
    adminId: string,
    options: { fields: ExportField[]; onlySubscribers: boolean }
  ): { jobId: string; topic: string } {
    const job = this.jobQueue.enqueue('user_export', {
      adminId,
      fields: options.fields,
      onlySubscribers: options.onlySubscribers,
    });

    this.exports.set(job.id, { adminId, lastEvent: null });
    logger.info({ jobId: job.id, adminId, fields: options.fields }, 'Member export queued');

    return { jobId: job.id, topic: exportTopic(adminId) };
  }

  /**
   * Export status, visible only to the admin who started it
   */
  getExportStatus(adminId: string, jobId: string): ExportStatus {
    const record = this.exports.get(jobId);
    const job = this.jobQueue.getJob(jobId);

    if (!job) {
      this.forgetExport(jobId);
    }
    if (!record || !job || record.adminId !== adminId) {
      throw new NotFoundError('Export not found');
    }

    return {
      jobId,
      status: job.status,
      attempts: job.attempts,
      createdAt: job.createdAt,
      finishedAt: job.finishedAt ?? null,
      lastEvent: record.lastEvent,
    };
  }

  /**
   * Absolute path of a finished export file
   */
  async resolveExportFile(fileName: string): Promise<string> {
    if (!EXPORT_FILE_PATTERN.test(fileName)) {
      throw new ValidationError('Invalid export file name');
    }

    const filePath = resolve(this.exportDir, fileName);
    try {
      const info = await stat(filePath);
      if (!info.isFile()) {
        throw new NotFoundError('Export file not found');
      }
    } catch (error) {
      if (error instanceof NotFoundError) throw error;
      throw new NotFoundError('Export file not found');
    }

    return filePath;
  }

  /**
   * Job handler for user_export
   */
  async runExport(job: Job<UserExportJob>): Promise<void> {
    const { adminId } = job.data;
    const fileName = exportFileName(new Date());
    const filePath = join(this.exportDir, fileName);
    const watchdog = new ProgressWatchdog(this.progressTimeoutMs);

    const work = this.writeExport(job, filePath, watchdog);
    // a stalled export may still settle after the watchdog gave up
    work.catch((error: unknown) => {
      if (watchdog.hasExpired) {
        logger.warn({ error, jobId: job.id }, 'Stalled export settled after timeout');
      }
    });

    try {
      const exported = await watchdog.race(work);

      this.publish(job.id, adminId, EXPORT_EVENTS.COMPLETE, {
        path: `/exports/${fileName}`,
        downloadUrl: `${env.PUBLIC_URL}/api/v1/admin/exports/files/${fileName}`,
        progress: 100,
      });
      logger.info({ jobId: job.id, adminId, fileName, exported }, 'Member export finished');
      metrics.incrementCounter('exports.completed');
    } catch (error) {
      logger.error({ error, jobId: job.id, adminId }, 'Member export failed');
      metrics.incrementCounter('exports.failed');
      this.publish(job.id, adminId, EXPORT_EVENTS.FAILED, { error: EXPORT_FAILED_MESSAGE });

      await rm(filePath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn({ error: cleanupError, filePath }, 'Failed to remove partial export');
      });
      throw error;
    }
  }

  /**
   * Drop the record of an evicted export job, and the admin's retained
   * progress event once none of their exports is left
   */
  private forgetExport(jobId: string): void {
    const record = this.exports.get(jobId);
    if (!record) return;
    this.exports.delete(jobId);

    const topic = exportTopic(record.adminId);
    const hasOtherExports = [...this.exports.values()].some(
      (other) => other.adminId === record.adminId
    );
    if (!hasOtherExports && this.eventBus.listenerCount(topic) === 0) {
      this.eventBus.forget(topic);
    }
  }

  private async writeExport(
    job: Job<UserExportJob>,
    filePath: string,
    watchdog: ProgressWatchdog
  ): Promise<number> {
    const { adminId, fields, onlySubscribers } = job.data;

    await mkdir(this.exportDir, { recursive: true });
    await writeFile(filePath, stringify([fields.map((field) => EXPORT_COLUMN_LABELS[field])]));

    const total = await this.userRepo.countExportableUsers(onlySubscribers);
    let exported = 0;
    let afterId: string | null = null;

    for (;;) {
      if (watchdog.hasExpired) {
        throw new Error('Export aborted after progress timeout');
      }

      const progress = total === 0 ? 0 : Math.trunc((exported / total) * 100);
      this.publish(job.id, adminId, EXPORT_EVENTS.PROGRESS, { progress });
      watchdog.touch();

      const rows = await this.userRepo.listExportableUsers(
        onlySubscribers,
        afterId,
        EXPORT_RULES.BATCH_SIZE
      );
      if (rows.length === 0) break;

      await appendFile(
        filePath,
        stringify(rows.map((row) => fields.map((field) => exportValue(row, field))))
      );

      exported += rows.length;
      afterId = rows[rows.length - 1]?.id ?? null;

      if (rows.length < EXPORT_RULES.BATCH_SIZE) break;
    }

    return exported;
  }

  private publish(jobId: string, adminId: string, event: string, payload: EventPayload): void {
    const busEvent = this.eventBus.publish(exportTopic(adminId), event, { jobId, ...payload });
    const record = this.exports.get(jobId);
    if (record) {
      record.lastEvent = busEvent;
    }
  }
}
