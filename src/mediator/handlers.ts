/**
 * DEFAULT REQUEST HANDLERS
 *
 * Each handler joins pure business logic to the effects it needs. The
 * dispatcher only sees the functions, never what they close over.
 */

import {randomUUID} from 'node:crypto';
import {AppEffects} from '../pure/effects';
import {NotificationKind} from '../types';
import {buildAuditEntry, buildOrderNotification, computeOrder} from '../pure/businessLogic';
import {validateOrder} from '../pure/validation';
import {Dispatcher} from './Dispatcher';
import {RequestHandler} from './requests';

export type HandlerOptions = {
    readonly staffRecipients: readonly string[];
};

const notificationLabels: Record<NotificationKind, string> = {
    ORDER_PROCESSED: 'processing',
    ORDER_FAILED: 'failure',
    ORDER_SHIPPED: 'shipping',
};

export function validationHandler(effects: Pick<AppEffects, 'clock'>): RequestHandler<'validateOrder'> {
    return async ({order}) => validateOrder(order, effects.clock.now());
}

/**
 * Price the order, render it with the chosen formatter and write the file.
 */
export function reportHandler(effects: Pick<AppEffects, 'clock' | 'reports'>): RequestHandler<'generateReport'> {
    return async ({order, formatter, outputPath}) => {
        const now = effects.clock.now();
        const calculationResults = computeOrder(order, now);
        const content = formatter.generate(order, calculationResults);
        const filePath = await effects.reports.write(outputPath, formatter.fileName(order, now), content);
        return {calculationResults, filePath};
    };
}

export function auditHandler(effects: Pick<AppEffects, 'clock' | 'audit'>): RequestHandler<'logAudit'> {
    return async ({order, processingResult, action, additionalData}) => {
        const timestamp = effects.clock.now();
        const entry = buildAuditEntry(randomUUID(), action, order, processingResult, additionalData, timestamp);
        await effects.audit.record(entry);
        return {success: true, logEntryId: entry.entryId, timestamp};
    };
}

export function notificationHandler(
    effects: Pick<AppEffects, 'notifications'>,
    options: HandlerOptions
): RequestHandler<'sendNotification'> {
    return async ({order, processingResult, notificationKind}) => {
        const payload = buildOrderNotification(order, processingResult, notificationKind, options.staffRecipients);
        await effects.notifications.send(payload);
        return {
            success: true,
            message: `Order ${order.id} ${notificationLabels[notificationKind]} notification sent to ${payload.to.length} recipients`,
            recipients: payload.to,
        };
    };
}

export function registerDefaultHandlers(
    dispatcher: Dispatcher,
    effects: AppEffects,
    options: HandlerOptions
): Dispatcher {
    return dispatcher
        .register('validateOrder', validationHandler(effects))
        .register('generateReport', reportHandler(effects))
        .register('logAudit', auditHandler(effects))
        .register('sendNotification', notificationHandler(effects, options));
}
