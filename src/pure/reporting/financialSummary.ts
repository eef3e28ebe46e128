import {CalculationResult, Order} from '../../domain';
import {OrderType, ReportFormatter} from '../types';
import {effectiveQuantity} from '../businessLogic';
import {escapeCsvField, formatDate, formatMoney, reportFileName, toCsv} from './csv';

export const FINANCIAL_HEADER = [
    'OrderID', 'CustomerID', 'OrderDate', 'OrderType', 'ItemCount', 'SubtotalExVAT', 'VATAmount',
    'DiscountAmount', 'ShippingCost', 'TotalAmount', 'PaymentMethod', 'PaymentProvider',
    'ProcessingFee', 'OrderStatus',
] as const;

/**
 * Only an order holding all three groupings is Mixed; otherwise kits win over
 * ensembles, and ensembles over individual products.
 */
export function determineOrderType(order: Order): OrderType {
    const hasIndividual = order.individualProducts.length > 0;
    const hasEnsembles = order.productEnsembles.length > 0;
    const hasKits = order.productKits.length > 0;

    if (hasIndividual && hasEnsembles && hasKits) return 'Mixed';
    if (hasKits) return 'Kit-Only';
    if (hasEnsembles) return 'Ensemble-Only';
    if (hasIndividual) return 'Individual-Only';
    return 'Empty';
}

export function countItems(order: Order): number {
    const individual = order.individualProducts
        .reduce((count, product) => count + effectiveQuantity(product.quantity), 0);
    const ensembles = order.productEnsembles
        .reduce((count, ensemble) => count + effectiveQuantity(ensemble.quantity) * ensemble.products.length, 0);
    const kits = order.productKits
        .reduce((count, kit) =>
            count + effectiveQuantity(kit.quantity) * (kit.mandatoryProducts.length + kit.optionalProducts.length), 0);
    return individual + ensembles + kits;
}

/**
 * A single aggregate row per order for finance.
 */
export const financialSummary: ReportFormatter = {
    description: 'Financial Summary CSV Format - Aggregated data for financial reporting',

    generate(order: Order, results: CalculationResult): string {
        const row = [
            escapeCsvField(order.id),
            escapeCsvField(order.customerId),
            formatDate(order.orderDate),
            determineOrderType(order),
            String(countItems(order)),
            formatMoney(results.subtotal),
            formatMoney(results.totalVAT),
            formatMoney(results.totalDiscount),
            formatMoney(order.shippingCost),
            formatMoney(results.grandTotal),
            escapeCsvField(order.paymentMethod?.type),
            escapeCsvField(order.paymentMethod?.provider),
            formatMoney(order.paymentMethod?.processingFee ?? 0),
            escapeCsvField(order.status),
        ];
        return toCsv(FINANCIAL_HEADER, [row]);
    },

    fileName(order: Order, generatedAt: Date = new Date()): string {
        return reportFileName('FinancialSummary', order.id, generatedAt);
    },
};
