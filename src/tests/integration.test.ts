/**
 * INTEGRATION TESTS
 *
 * The mediator, dispatcher and default handlers run for real against
 * jest.fn effects. Pricing and formatting are covered by their own tests;
 * these check the plumbing and the failure policy of each workflow step.
 */

import {ProcessOrderRequest} from '../domain';
import {ReportFormatter} from '../pure/types';
import {computeOrder} from '../pure/businessLogic';
import {standardRetailAudit} from '../pure/reporting';
import {PersistenceError} from '../effects/PersistenceError';
import {Dispatcher} from '../mediator/Dispatcher';
import {HandlerInvocationError} from '../mediator/errors';
import {OrderProcessingMediator} from '../mediator/OrderProcessingMediator';
import {Logger, LogLevel} from '../logger';
import {createMockEffects, discountCode, NOW, order, paymentMethod} from './fixtures';

const STANDARD = 'Standard Retail Audit CSV Format - Compatible with legacy systems';
const FINANCIAL = 'Financial Summary CSV Format - Aggregated data for financial reporting';

const logger = new Logger(LogLevel.DEBUG);

const request = (overrides: Partial<ProcessOrderRequest> = {}): ProcessOrderRequest => ({
  order: order(),
  strategyName: 'Standard',
  outputPath: 'reports',
  validateOrder: true,
  sendNotifications: true,
  logAuditTrail: true,
  ...overrides,
});

let warn: jest.SpyInstance;
let error: jest.SpyInstance;

beforeEach(() => {
  jest.spyOn(Logger.prototype, 'info').mockImplementation(() => undefined);
  warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('processOrder integration', () => {
  it('writes the report and returns a successful result', async () => {
    const effects = createMockEffects();
    const mediator = new OrderProcessingMediator(effects, {logger});

    const result = await mediator.processOrder(request());

    expect(result.success).toBe(true);
    expect(result.orderId).toBe('order-123');
    expect(result.errorMessage).toBeNull();
    expect(result.strategyUsed).toBe(STANDARD);
    expect(result.processedAt).toBe(NOW);
    expect(result.csvFilePath).toMatch(/^reports\/RetailAudit_order-123_20240615_103045_[0-9a-f-]{36}\.csv$/);
    expect(result.calculationResults?.grandTotal).toBeCloseTo(29);
    expect(effects.reports.write).toHaveBeenCalledWith(
      'reports',
      expect.stringMatching(/^RetailAudit_order-123_/),
      'OrderID,CustomerID,OrderDate,ItemType,ProductID,ProductName,Quantity,UnitPrice,TotalPrice,VATAmount,DiscountApplied\n' +
      'order-123,cust-456,2024-06-10,Individual,prod-1,Widget,2,10.00,20.00,4.00,0.00\n'
    );
  });

  it('records the audit trail with strategy, path and time', async () => {
    const effects = createMockEffects();
    const mediator = new OrderProcessingMediator(effects, {logger});

    await mediator.processOrder(request());

    expect(effects.audit.record).toHaveBeenCalledTimes(1);
    expect(effects.audit.record).toHaveBeenCalledWith(expect.objectContaining({
      action: 'ORDER_PROCESSED',
      orderId: 'order-123',
      customerId: 'cust-456',
      success: true,
      errorMessage: null,
      timestamp: NOW,
      data: {Strategy: STANDARD, OutputPath: 'reports', ProcessingTime: NOW.toISOString()},
    }));
  });

  it('notifies the customer and staff', async () => {
    const effects = createMockEffects();
    const mediator = new OrderProcessingMediator(effects, {logger, staffRecipients: ['admin@example.com']});

    await mediator.processOrder(request());

    expect(effects.notifications.send).toHaveBeenCalledWith(expect.objectContaining({
      kind: 'ORDER_PROCESSED',
      to: ['test@example.com', 'admin@example.com'],
      subject: 'Order order-123 processed',
    }));
  });

  it('succeeds with an expired discount code that contributes nothing', async () => {
    const mediator = new OrderProcessingMediator(createMockEffects(), {logger});

    const result = await mediator.processOrder(request({
      order: order({appliedDiscountCodes: [discountCode({validTo: new Date(2024, 0, 31)})]}),
    }));

    expect(result.success).toBe(true);
    expect(result.calculationResults?.totalDiscount).toBe(0);
  });

  it('skips the audit trail and notifications when not requested', async () => {
    const effects = createMockEffects();
    const mediator = new OrderProcessingMediator(effects, {logger});

    const result = await mediator.processOrder(request({logAuditTrail: false, sendNotifications: false}));

    expect(result.success).toBe(true);
    expect(effects.audit.record).not.toHaveBeenCalled();
    expect(effects.notifications.send).not.toHaveBeenCalled();
  });
});

describe('strategy resolution', () => {
  it('falls back to the first registered format for an unknown name', async () => {
    const mediator = new OrderProcessingMediator(createMockEffects(), {logger});

    const result = await mediator.processOrder(request({strategyName: 'Unknown'}));

    expect(result.success).toBe(true);
    expect(result.strategyUsed).toBe(STANDARD);
    expect(warn).toHaveBeenCalledWith(`Strategy 'Unknown' not found, using default: ${STANDARD}`);
  });

  it('falls back to the configured default strategy', async () => {
    const mediator = new OrderProcessingMediator(createMockEffects(), {logger, defaultStrategy: 'Financial'});

    const result = await mediator.processOrder(request({strategyName: 'Unknown'}));

    expect(result.strategyUsed).toBe(FINANCIAL);
    expect(result.csvFilePath).toMatch(/^reports\/FinancialSummary_/);
  });

  it('ignores a configured default that is not registered', async () => {
    const mediator = new OrderProcessingMediator(createMockEffects(), {logger, defaultStrategy: 'Missing'});

    const result = await mediator.processOrder(request({strategyName: 'Unknown'}));

    expect(result.strategyUsed).toBe(STANDARD);
  });

  it('uses a strategy registered at run time', async () => {
    const custom: ReportFormatter = {
      description: 'Custom',
      generate: () => 'OrderID\norder-123\n',
      fileName: () => 'custom.csv',
    };
    const mediator = new OrderProcessingMediator(createMockEffects(), {logger});
    mediator.registerStrategy('Custom', custom);

    const result = await mediator.processOrder(request({strategyName: 'Custom'}));

    expect(result.strategyUsed).toBe('Custom');
    expect(result.csvFilePath).toBe('reports/custom.csv');
  });

  it('lists the available strategies', () => {
    const mediator = new OrderProcessingMediator(createMockEffects(), {logger});

    expect(mediator.getAvailableStrategies().map(strategy => strategy.name)).toEqual(['Standard', 'Enhanced', 'Financial']);
    expect(mediator.getStrategy('Nope').isNothing()).toBe(true);
  });

  it('rejects an empty strategy name', () => {
    const mediator = new OrderProcessingMediator(createMockEffects(), {logger});

    expect(() => mediator.registerStrategy('', standardRetailAudit))
      .toThrow('Strategy name cannot be empty');
  });

  it('fails the order when no formats are registered', async () => {
    const mediator = new OrderProcessingMediator(createMockEffects(), {logger, formatters: []});

    const result = await mediator.processOrder(request());

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe('No report formatters registered');
  });
});

describe('validation', () => {
  it('stops at validation errors without writing, auditing or notifying', async () => {
    const effects = createMockEffects();
    const mediator = new OrderProcessingMediator(effects, {logger});

    const result = await mediator.processOrder(request({order: order({customerId: '', paymentMethod: null})}));

    expect(result).toEqual({
      success: false,
      orderId: 'order-123',
      calculationResults: null,
      csvFilePath: '',
      errorMessage: 'Order validation failed: Customer ID is required, Payment method is required',
      strategyUsed: '',
      processedAt: NOW,
    });
    expect(effects.reports.write).not.toHaveBeenCalled();
    expect(effects.audit.record).not.toHaveBeenCalled();
    expect(effects.notifications.send).not.toHaveBeenCalled();
  });

  it('processes an invalid order when validation is off', async () => {
    const mediator = new OrderProcessingMediator(createMockEffects(), {logger});

    const result = await mediator.processOrder(request({
      order: order({customerId: '', paymentMethod: null}),
      validateOrder: false,
    }));

    expect(result.success).toBe(true);
  });

  it('logs warnings and carries on', async () => {
    const mediator = new OrderProcessingMediator(createMockEffects(), {logger});

    const result = await mediator.processOrder(request({
      order: order({paymentMethod: paymentMethod({transactionId: ''})}),
    }));

    expect(result.success).toBe(true);
    expect(warn).toHaveBeenCalledWith('Validation warnings', {warnings: ['Payment transaction ID is missing']});
  });
});

describe('failure policy', () => {
  it('keeps a successful result when audit logging fails', async () => {
    const effects = createMockEffects({audit: {record: jest.fn().mockRejectedValue(new Error('audit down'))}});
    const mediator = new OrderProcessingMediator(effects, {logger});

    const result = await mediator.processOrder(request());

    expect(result.success).toBe(true);
    expect(error).toHaveBeenCalledWith('Audit logging failed', expect.any(HandlerInvocationError));
  });

  it('keeps a successful result when the notification fails', async () => {
    const effects = createMockEffects({notifications: {send: jest.fn().mockRejectedValue(new Error('smtp down'))}});
    const mediator = new OrderProcessingMediator(effects, {logger});

    const result = await mediator.processOrder(request());

    expect(result.success).toBe(true);
    expect(warn).toHaveBeenCalledWith('Notification failed', {error: 'smtp down'});
  });

  it('reports a failed write as a failed result and audits it', async () => {
    const writeError = new PersistenceError('Failed to write report file reports/x.csv: EACCES');
    const effects = createMockEffects({reports: {write: jest.fn().mockRejectedValue(writeError)}});
    const mediator = new OrderProcessingMediator(effects, {logger});

    const result = await mediator.processOrder(request());

    expect(result).toEqual({
      success: false,
      orderId: 'order-123',
      calculationResults: null,
      csvFilePath: '',
      errorMessage: 'Failed to write report file reports/x.csv: EACCES',
      strategyUsed: STANDARD,
      processedAt: NOW,
    });
    expect(effects.audit.record).toHaveBeenCalledWith(expect.objectContaining({
      action: 'ORDER_PROCESSED',
      success: false,
    }));
    expect(effects.notifications.send).not.toHaveBeenCalled();
  });

  it('turns an unexpected error into a failed result with an error audit entry', async () => {
    const effects = createMockEffects({reports: {write: jest.fn().mockRejectedValue(new Error('boom'))}});
    const mediator = new OrderProcessingMediator(effects, {logger});

    const result = await mediator.processOrder(request());

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe('boom');
    expect(result.strategyUsed).toBe('');
    expect(effects.audit.record).toHaveBeenCalledTimes(1);
    expect(effects.audit.record).toHaveBeenCalledWith(expect.objectContaining({
      action: 'ORDER_PROCESSING_ERROR',
      success: false,
      errorMessage: 'boom',
      data: {Error: 'boom'},
    }));
    expect(effects.notifications.send).not.toHaveBeenCalled();
  });

  it('logs and swallows a failure to audit an unexpected error', async () => {
    const effects = createMockEffects({
      reports: {write: jest.fn().mockRejectedValue(new Error('boom'))},
      audit: {record: jest.fn().mockRejectedValue(new Error('audit down'))},
    });
    const mediator = new OrderProcessingMediator(effects, {logger});

    const result = await mediator.processOrder(request());

    expect(result.errorMessage).toBe('boom');
    expect(warn).toHaveBeenCalledWith('Audit logging of failure failed', {error: 'audit down'});
  });
});

describe('dispatcher wiring', () => {
  it('refuses a dispatcher missing a handler', () => {
    const dispatcher = new Dispatcher().register('validateOrder', jest.fn());

    expect(() => new OrderProcessingMediator(createMockEffects(), {logger, dispatcher}))
      .toThrow('No handler registered for request kind generateReport');
  });

  it('routes through handlers replaced after construction', async () => {
    const mediator = new OrderProcessingMediator(createMockEffects(), {logger});
    mediator.dispatcher.register('validateOrder', jest.fn().mockResolvedValue({
      isValid: false,
      errors: ['Blocked by policy'],
      warnings: [],
    }));

    const result = await mediator.processOrder(request());

    expect(result.errorMessage).toBe('Order validation failed: Blocked by policy');
  });
});

describe('concurrent runs', () => {
  it('processes several orders at once on one mediator', async () => {
    const effects = createMockEffects();
    const mediator = new OrderProcessingMediator(effects, {logger});
    const custom: ReportFormatter = {
      description: 'Custom',
      generate: () => 'OrderID\n',
      fileName: input => `custom_${input.id}.csv`,
    };

    const first = mediator.processOrder(request({order: order({id: 'order-1'}), strategyName: 'Standard'}));
    const second = mediator.processOrder(request({order: order({id: 'order-2'}), strategyName: 'Financial'}));
    mediator.registerStrategy('Custom', custom);
    const third = mediator.processOrder(request({order: order({id: 'order-3'}), strategyName: 'Custom'}));

    const results = await Promise.all([first, second, third]);

    expect(results.map(result => [result.orderId, result.success, result.strategyUsed])).toEqual([
      ['order-1', true, STANDARD],
      ['order-2', true, FINANCIAL],
      ['order-3', true, 'Custom'],
    ]);
    expect(results[2].csvFilePath).toBe('reports/custom_order-3.csv');
    expect(effects.reports.write).toHaveBeenCalledTimes(3);
    expect(effects.audit.record).toHaveBeenCalledTimes(3);
  });
});

describe('immutability', () => {
  it('leaves the order untouched across a full run', async () => {
    const input = order({appliedDiscountCodes: [discountCode()]});
    const before = structuredClone(input);
    const mediator = new OrderProcessingMediator(createMockEffects(), {logger});

    const result = await mediator.processOrder(request({order: input}));

    expect(result.success).toBe(true);
    expect(input).toEqual(before);
    expect(result.calculationResults).toEqual(computeOrder(before, NOW));
  });
});
