/**
 * ORDER PROCESSING MEDIATOR - The Coordinator
 *
 * Runs one order through the workflow, strictly in this order:
 * 1. Validate (optional) - hard errors end the run with a failed result
 * 2. Resolve the report format by name, falling back to a default
 * 3. Price, render and write the report
 * 4. Record the audit trail (optional) - failures are logged, never fatal
 * 5. Notify (optional, only after a successful step 3)
 *
 * Every step goes through the dispatcher; the mediator never calls the
 * validator, pricing engine or effects directly.
 */

import {ProcessingResult, ProcessOrderRequest} from '../domain';
import {AppEffects, Clock} from '../pure/effects';
import {ReportFormatter} from '../pure/types';
import {validationOutcome} from '../pure/validation';
import {defaultFormatters} from '../pure/reporting';
import {PersistenceError} from '../effects/PersistenceError';
import {Logger, logger as defaultLogger} from '../logger';
import {Dispatcher} from './Dispatcher';
import {HandlerInvocationError} from './errors';
import {registerDefaultHandlers} from './handlers';
import {GeneratedReport} from './requests';
import {Either, EitherAsync, Maybe, NonEmptyList, Right} from 'purify-ts';

export type MediatorOptions = {
    // a pre-wired dispatcher; every request kind must already have a handler
    readonly dispatcher?: Dispatcher;
    readonly formatters?: ReadonlyArray<readonly [string, ReportFormatter]>;
    // fallback format for unknown names; the first registered one otherwise
    readonly defaultStrategy?: string;
    readonly staffRecipients?: readonly string[];
    readonly logger?: Logger;
};

const messageOf = (error: unknown): string =>
    error instanceof HandlerInvocationError
        ? error.originalMessage
        : error instanceof Error ? error.message : String(error);

const isPersistenceFailure = (error: unknown): boolean =>
    error instanceof HandlerInvocationError && error.cause instanceof PersistenceError;

export class OrderProcessingMediator {
    readonly dispatcher: Dispatcher;
    private readonly strategies = new Map<string, ReportFormatter>();
    private readonly clock: Clock;
    private readonly logger: Logger;
    private readonly defaultStrategy?: string;

    /**
     * @throws NoHandlerRegisteredError when a supplied dispatcher is missing a handler
     */
    constructor(effects: AppEffects, options: MediatorOptions = {}) {
        this.clock = effects.clock;
        this.logger = options.logger ?? defaultLogger;
        this.defaultStrategy = options.defaultStrategy;
        this.dispatcher = options.dispatcher
            ?? registerDefaultHandlers(new Dispatcher(), effects, {staffRecipients: options.staffRecipients ?? []});
        this.dispatcher.ensureRegistered('validateOrder', 'generateReport', 'logAudit', 'sendNotification');

        for (const [name, formatter] of options.formatters ?? defaultFormatters()) {
            this.registerStrategy(name, formatter);
        }
    }

    registerStrategy(name: string, formatter: ReportFormatter): void {
        if (!name) {
            throw new Error('Strategy name cannot be empty');
        }
        this.strategies.set(name, formatter);
    }

    getStrategy(name: string): Maybe<ReportFormatter> {
        return Maybe.fromNullable(this.strategies.get(name));
    }

    getAvailableStrategies(): Array<{ name: string; description: string }> {
        return [...this.strategies].map(([name, formatter]) => ({name, description: formatter.description}));
    }

    async processOrder(request: ProcessOrderRequest): Promise<ProcessingResult> {
        const {order} = request;
        const log = this.logger.child({orderId: order.id, customerId: order.customerId});
        log.info('Processing order', {strategy: request.strategyName});

        try {
            const validation = await this.validate(request, log);
            return await validation.caseOf({
                Left: errors => Promise.resolve(this.rejected(request, errors, log)),
                Right: () => this.generateAndFinalise(request, log),
            });
        } catch (error) {
            return this.failed(request, error, log);
        }
    }

    // ========== STEP 1: VALIDATION ==========

    private async validate(
        request: ProcessOrderRequest,
        log: Logger
    ): Promise<Either<NonEmptyList<string>, readonly string[]>> {
        if (!request.validateOrder) return Right([]);

        const result = await this.dispatcher.send({kind: 'validateOrder', payload: {order: request.order}});
        if (result.warnings.length > 0) {
            log.warn('Validation warnings', {warnings: result.warnings});
        }
        return validationOutcome(result).map(valid => valid.warnings);
    }

    private rejected(request: ProcessOrderRequest, errors: NonEmptyList<string>, log: Logger): ProcessingResult {
        log.warn('Order rejected by validation', {errors});
        return {
            success: false,
            orderId: request.order.id,
            calculationResults: null,
            csvFilePath: '',
            errorMessage: `Order validation failed: ${errors.join(', ')}`,
            strategyUsed: '',
            processedAt: this.clock.now(),
        };
    }

    // ========== STEPS 2-5 ==========

    private async generateAndFinalise(request: ProcessOrderRequest, log: Logger): Promise<ProcessingResult> {
        const result = await this.generate(request, log);

        if (request.logAuditTrail) {
            await this.auditProcessed(request, result, log);
        }
        if (request.sendNotifications && result.success) {
            await this.notify(request, result, log);
        }

        log.info('Order processing complete', {success: result.success, csvFilePath: result.csvFilePath});
        return result;
    }

    private resolveStrategy(name: string, log: Logger): ReportFormatter {
        return this.getStrategy(name)
            .altLazy(() => this.fallbackStrategy()
                .ifJust(fallback => log.warn(`Strategy '${name}' not found, using default: ${fallback.description}`)))
            .orDefaultLazy(() => {
                throw new Error('No report formatters registered');
            });
    }

    private fallbackStrategy(): Maybe<ReportFormatter> {
        const configured: Maybe<ReportFormatter> = this.defaultStrategy === undefined
            ? Maybe.empty()
            : this.getStrategy(this.defaultStrategy);
        return configured.altLazy(() => Maybe.fromNullable(this.strategies.values().next().value));
    }

    private async generate(request: ProcessOrderRequest, log: Logger): Promise<ProcessingResult> {
        const {order, outputPath} = request;
        const formatter = this.resolveStrategy(request.strategyName, log);

        const report = await EitherAsync<unknown, GeneratedReport>(() => this.dispatcher.send({
            kind: 'generateReport',
            payload: {order, formatter, outputPath},
        })).run();

        return report.caseOf<ProcessingResult>({
            Left: error => {
                // a failed write is an expected outcome; anything else is not
                if (!isPersistenceFailure(error)) throw error;
                log.error('Report could not be written', error);
                return {
                    success: false,
                    orderId: order.id,
                    calculationResults: null,
                    csvFilePath: '',
                    errorMessage: messageOf(error),
                    strategyUsed: formatter.description,
                    processedAt: this.clock.now(),
                };
            },
            Right: ({calculationResults, filePath}) => {
                log.info('Report written', {
                    csvFilePath: filePath,
                    strategy: formatter.description,
                    grandTotal: calculationResults.grandTotal,
                    totalVAT: calculationResults.totalVAT,
                });
                return {
                    success: true,
                    orderId: order.id,
                    calculationResults,
                    csvFilePath: filePath,
                    errorMessage: null,
                    strategyUsed: formatter.description,
                    processedAt: this.clock.now(),
                };
            },
        });
    }

    private async auditProcessed(request: ProcessOrderRequest, result: ProcessingResult, log: Logger): Promise<void> {
        try {
            const audit = await this.dispatcher.send({
                kind: 'logAudit',
                payload: {
                    order: request.order,
                    processingResult: result,
                    action: 'ORDER_PROCESSED',
                    additionalData: {
                        Strategy: result.strategyUsed,
                        OutputPath: request.outputPath,
                        ProcessingTime: result.processedAt.toISOString(),
                    },
                },
            });
            log.info('Audit logged', {logEntryId: audit.logEntryId});
        } catch (error) {
            log.error('Audit logging failed', error);
        }
    }

    private async notify(request: ProcessOrderRequest, result: ProcessingResult, log: Logger): Promise<void> {
        try {
            const notification = await this.dispatcher.send({
                kind: 'sendNotification',
                payload: {order: request.order, processingResult: result, notificationKind: 'ORDER_PROCESSED'},
            });
            log.info('Notification sent', {message: notification.message});
        } catch (error) {
            log.warn('Notification failed', {error: messageOf(error)});
        }
    }

    // ========== UNEXPECTED FAILURES ==========

    private async failed(request: ProcessOrderRequest, error: unknown, log: Logger): Promise<ProcessingResult> {
        const errorMessage = messageOf(error);
        log.error('Error in order processing', error);

        const result: ProcessingResult = {
            success: false,
            orderId: request.order.id,
            calculationResults: null,
            csvFilePath: '',
            errorMessage,
            strategyUsed: '',
            processedAt: this.clock.now(),
        };

        if (request.logAuditTrail) {
            // one attempt only; its own failure does not change the result
            await this.dispatcher.send({
                kind: 'logAudit',
                payload: {
                    order: request.order,
                    processingResult: result,
                    action: 'ORDER_PROCESSING_ERROR',
                    additionalData: {Error: errorMessage},
                },
            }).catch((auditError: unknown) => log.warn('Audit logging of failure failed', {error: messageOf(auditError)}));
        }

        return result;
    }
}
