/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * The real implementations behind AppEffects:
 * - the local filesystem for report files
 * - the structured logger for the audit trail
 * - nodemailer (SMTP, or the JSON transport when no host is configured) for notifications
 * - the system clock
 */
import {mkdir, writeFile} from 'node:fs/promises';
import path from 'node:path';
import nodemailer, {Transporter} from 'nodemailer';
import {AuditEntry, NotificationPayload} from '../types';
import {AppEffects, AuditLog, Clock, NotificationService, ReportStore} from '../pure/effects';
import {AppConfig, EmailConfig} from './types';
import {PersistenceError} from './PersistenceError';
import {Logger, logger as defaultLogger} from '../logger';

// ============================================================================
// Configuration
// ============================================================================

const listFrom = (value: string | undefined): string[] =>
  (value ?? '').split(',').map(entry => entry.trim()).filter(entry => entry.length > 0);

// Load configuration from environment variables
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    reports: {
      outputPath: env.REPORT_OUTPUT_PATH || './reports',
      defaultStrategy: env.DEFAULT_STRATEGY || undefined,
    },
    email: {
      host: env.SMTP_HOST || undefined,
      port: parseInt(env.SMTP_PORT || '1025', 10),
      from: env.NOTIFY_FROM || '"Order Audit" <noreply@example.com>',
      staffRecipients: listFrom(env.NOTIFY_STAFF_RECIPIENTS),
    },
    server: {
      port: parseInt(env.API_PORT || '3000', 10),
    },
  };
}

// ============================================================================
// Filesystem Report Store
// ============================================================================

export class FileReportStore implements ReportStore {
  async write(outputPath: string, fileName: string, content: string): Promise<string> {
    const filePath = path.join(outputPath, fileName);
    try {
      await mkdir(outputPath, {recursive: true});
      await writeFile(filePath, content, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PersistenceError(`Failed to write report file ${filePath}: ${reason}`, {cause: error});
    }
    return filePath;
  }
}

// ============================================================================
// Logger Audit Log
// ============================================================================

export class LoggerAuditLog implements AuditLog {
  constructor(private readonly log: Logger) {}

  async record(entry: AuditEntry): Promise<void> {
    this.log.info('Audit entry', {...entry, timestamp: entry.timestamp.toISOString()});
  }
}

// ============================================================================
// Nodemailer Notification Service
// ============================================================================

export class NodemailerNotificationService implements NotificationService {
  private readonly transporter: Transporter;

  constructor(private readonly config: EmailConfig, private readonly log: Logger) {
    this.transporter = config.host === undefined
      ? nodemailer.createTransport({jsonTransport: true})
      : nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: false,
        ignoreTLS: true,
      });
  }

  async send(payload: NotificationPayload): Promise<void> {
    if (payload.to.length === 0) {
      this.log.debug('Notification has no recipients', {kind: payload.kind, subject: payload.subject});
      return;
    }

    await this.transporter.sendMail({
      from: this.config.from,
      to: [...payload.to],
      subject: payload.subject,
      text: payload.body,
      html: `<p>${payload.body.replace(/\n/g, '<br>')}</p>`,
    });
    this.log.info('Notification sent', {kind: payload.kind, to: payload.to, subject: payload.subject});
  }
}

// ============================================================================
// System Clock
// ============================================================================

export const systemClock: Clock = {
  now: () => new Date(),
};

// ============================================================================
// Production EffectsFactory
// ============================================================================

class EffectsFactory implements AppEffects {
  private _reports?: ReportStore;
  private _audit?: AuditLog;
  private _notifications?: NotificationService;

  constructor(private readonly config: AppConfig, private readonly log: Logger) {}

  get reports(): ReportStore {
    if (!this._reports) {
      this._reports = new FileReportStore();
    }
    return this._reports;
  }

  get audit(): AuditLog {
    if (!this._audit) {
      this._audit = new LoggerAuditLog(this.log.child({component: 'audit'}));
    }
    return this._audit;
  }

  get notifications(): NotificationService {
    if (!this._notifications) {
      this._notifications = new NodemailerNotificationService(
        this.config.email,
        this.log.child({component: 'notifications'})
      );
    }
    return this._notifications;
  }

  get clock(): Clock {
    return systemClock;
  }

  static make(config?: AppConfig, log: Logger = defaultLogger): AppEffects {
    return new EffectsFactory(config ?? loadConfigFromEnv(), log);
  }
}

// Export a factory function
export function makeAppEffects(config?: AppConfig, log?: Logger): AppEffects {
  return EffectsFactory.make(config, log);
}
