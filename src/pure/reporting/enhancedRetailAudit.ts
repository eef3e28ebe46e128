import {CalculationResult, Order, Product} from '../../domain';
import {ReportFormatter} from '../types';
import {escapeCsvField, formatDate, formatMoney, formatPercent, reportFileName, toCsv} from './csv';
import {LineItemGroup, reportLineItems} from './lineItems';

export const ENHANCED_HEADER = [
    'OrderID', 'CustomerID', 'CustomerEmail', 'OrderDate', 'ItemType', 'ProductID', 'ProductName',
    'Category', 'Supplier', 'Quantity', 'UnitPrice', 'TotalPrice', 'VATRate', 'VATAmount',
    'DiscountApplied', 'PaymentMethodType', 'TrackingNumber', 'ComplianceStatus',
] as const;

export type ComplianceIssue =
    | 'NO_SUPPLIER'
    | 'INVALID_VAT'
    | 'NO_TRACKING'
    | 'UNVERIFIED_PAYMENT'
    | 'INACTIVE_DISCOUNT';

export function complianceIssues(order: Order, product: Product): ComplianceIssue[] {
    const checks: ReadonlyArray<[boolean, ComplianceIssue]> = [
        [!product.supplier, 'NO_SUPPLIER'],
        [product.vatRate <= 0, 'INVALID_VAT'],
        [!order.trackingNumber && order.status === 'Shipped', 'NO_TRACKING'],
        [!(order.paymentMethod?.isVerified ?? false), 'UNVERIFIED_PAYMENT'],
        [order.appliedDiscountCodes.some(code => !code.isActive), 'INACTIVE_DISCOUNT'],
    ];
    return checks.filter(([applies]) => applies).map(([, issue]) => issue);
}

export function complianceStatus(order: Order, product: Product): string {
    const issues = complianceIssues(order, product);
    return issues.length > 0 ? issues.join(';') : 'COMPLIANT';
}

function itemType(group: LineItemGroup, groupLabel: string): string {
    switch (group) {
        case 'Individual':
            return group;
        case 'Ensemble':
            return `Ensemble-${groupLabel}`;
        case 'Kit-Mandatory':
            return `Kit-${groupLabel}-Mandatory`;
        case 'Kit-Optional':
            return `Kit-${groupLabel}-Optional`;
    }
}

/**
 * Product lines with supplier, tax and payment details plus a per-line
 * compliance verdict.
 */
export const enhancedRetailAudit: ReportFormatter = {
    description: 'Enhanced Retail Audit CSV Format - Includes compliance and tracking data',

    generate(order: Order, results: CalculationResult): string {
        const rows = reportLineItems(results).map(({group, groupLabel, calculation}) => {
            const product = calculation.product;
            return [
                escapeCsvField(order.id),
                escapeCsvField(order.customerId),
                escapeCsvField(order.customerEmail),
                formatDate(order.orderDate),
                escapeCsvField(itemType(group, groupLabel)),
                escapeCsvField(product.id),
                escapeCsvField(product.name),
                escapeCsvField(product.category),
                escapeCsvField(product.supplier),
                String(product.quantity),
                formatMoney(calculation.unitPrice),
                formatMoney(calculation.totalPrice),
                formatPercent(product.vatRate),
                formatMoney(calculation.vatAmount),
                formatMoney(calculation.discountApplied),
                escapeCsvField(order.paymentMethod?.type),
                escapeCsvField(order.trackingNumber || 'N/A'),
                complianceStatus(order, product),
            ];
        });
        return toCsv(ENHANCED_HEADER, rows);
    },

    fileName(order: Order, generatedAt: Date = new Date()): string {
        return reportFileName('EnhancedRetailAudit', order.id, generatedAt);
    },
};
