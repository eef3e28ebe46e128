import {CalculationResult, Order} from '../../domain';
import {ReportFormatter} from '../types';
import {escapeCsvField, formatDate, formatMoney, reportFileName, toCsv} from './csv';
import {reportLineItems} from './lineItems';

export const STANDARD_HEADER = [
    'OrderID', 'CustomerID', 'OrderDate', 'ItemType', 'ProductID', 'ProductName',
    'Quantity', 'UnitPrice', 'TotalPrice', 'VATAmount', 'DiscountApplied',
] as const;

/**
 * One row per product line, in the column layout legacy audit tools read.
 */
export const standardRetailAudit: ReportFormatter = {
    description: 'Standard Retail Audit CSV Format - Compatible with legacy systems',

    generate(order: Order, results: CalculationResult): string {
        const rows = reportLineItems(results).map(({group, calculation}) => [
            escapeCsvField(order.id),
            escapeCsvField(order.customerId),
            formatDate(order.orderDate),
            group,
            escapeCsvField(calculation.product.id),
            escapeCsvField(calculation.product.name),
            String(calculation.product.quantity),
            formatMoney(calculation.unitPrice),
            formatMoney(calculation.totalPrice),
            formatMoney(calculation.vatAmount),
            formatMoney(calculation.discountApplied),
        ]);
        return toCsv(STANDARD_HEADER, rows);
    },

    fileName(order: Order, generatedAt: Date = new Date()): string {
        return reportFileName('RetailAudit', order.id, generatedAt);
    },
};
