/**
 * EFFECTS LAYER
 *
 * Every piece of IO the workflow performs sits behind one of these small
 * interfaces. Production implementations live in effects/EffectsFactory.ts;
 * tests hand in plain objects.
 */

import {AuditEntry, NotificationPayload} from '../types';

export interface ReportStore {
  /**
   * Write the report under `outputPath`, creating the directory if needed.
   * @return the full path of the written file
   */
  write(outputPath: string, fileName: string, content: string): Promise<string>;
}

export interface AuditLog {
  record(entry: AuditEntry): Promise<void>;
}

export interface NotificationService {
  send(payload: NotificationPayload): Promise<void>;
}

export interface Clock {
  now(): Date;
}

export type AppEffects = {
  readonly reports: ReportStore;
  readonly audit: AuditLog;
  readonly notifications: NotificationService;
  readonly clock: Clock;
}
