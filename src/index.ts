export type * from './domain';
export type * from './types';
export type {ReportFormatter, ValidationResult, OrderType} from './pure/types';
export type {AppEffects, AuditLog, Clock, NotificationService, ReportStore} from './pure/effects';
export type {AppConfig} from './effects/types';
export type {RequestMap, RequestKind, RequestHandler, DispatchRequest} from './mediator/requests';

export {computeOrder, recordDiscountUsage} from './pure/businessLogic';
export {validateOrder, validationOutcome} from './pure/validation';
export {defaultFormatters, standardRetailAudit, enhancedRetailAudit, financialSummary} from './pure/reporting';
export {Dispatcher} from './mediator/Dispatcher';
export {HandlerInvocationError, NoHandlerRegisteredError} from './mediator/errors';
export {registerDefaultHandlers} from './mediator/handlers';
export {OrderProcessingMediator, type MediatorOptions} from './mediator/OrderProcessingMediator';
export {loadConfigFromEnv, makeAppEffects} from './effects/EffectsFactory';
export {PersistenceError} from './effects/PersistenceError';
export {Logger, LogLevel, logger} from './logger';
