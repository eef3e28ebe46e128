/**
 * REQUEST KINDS
 *
 * Each key of RequestMap is a request kind the dispatcher can route, paired
 * with the payload its handler takes and the response it resolves to. New
 * kinds can be added by augmenting the interface.
 */

import {CalculationResult, Order, ProcessingResult} from '../domain';
import {AuditAction, NotificationKind} from '../types';
import {ReportFormatter, ValidationResult} from '../pure/types';

export type ValidateOrderRequest = {
  readonly order: Order;
};

export type GenerateReportRequest = {
  readonly order: Order;
  readonly formatter: ReportFormatter;
  readonly outputPath: string;
};

export type GeneratedReport = {
  readonly calculationResults: CalculationResult;
  readonly filePath: string;
};

export type LogAuditRequest = {
  readonly order: Order;
  readonly processingResult: ProcessingResult;
  readonly action: AuditAction;
  readonly additionalData: Readonly<Record<string, string>>;
};

export type AuditLogResult = {
  readonly success: boolean;
  readonly logEntryId: string;
  readonly timestamp: Date;
};

export type SendNotificationRequest = {
  readonly order: Order;
  readonly processingResult: ProcessingResult;
  readonly notificationKind: NotificationKind;
};

export type NotificationResult = {
  readonly success: boolean;
  readonly message: string;
  readonly recipients: readonly string[];
};

export interface RequestMap {
  validateOrder: { request: ValidateOrderRequest; response: ValidationResult };
  generateReport: { request: GenerateReportRequest; response: GeneratedReport };
  logAudit: { request: LogAuditRequest; response: AuditLogResult };
  sendNotification: { request: SendNotificationRequest; response: NotificationResult };
}

export type RequestKind = keyof RequestMap;

export type RequestPayload<K extends RequestKind> = RequestMap[K]['request'];

export type RequestResponse<K extends RequestKind> = RequestMap[K]['response'];

export type DispatchRequest<K extends RequestKind> = {
  readonly kind: K;
  readonly payload: RequestPayload<K>;
};

export type RequestHandler<K extends RequestKind> = (payload: RequestPayload<K>) => Promise<RequestResponse<K>>;
