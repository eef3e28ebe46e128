/**
 * PURE BUSINESS LOGIC
 *
 * Order pricing and the payloads built from a processed order. These functions
 * take values and return values: no effects, no mutation of their inputs.
 *
 * Note that for simplicity currency and correct decimal precision are not
 * integrated into calculations with prices.
 */

import {
    CalculationResult,
    DiscountApplication,
    DiscountCode,
    DiscountIneligibility,
    EnsembleCalculation,
    KitCalculation,
    Order,
    ProcessingResult,
    Product,
    ProductCalculation,
    ProductEnsemble,
    ProductKit,
} from '../domain';
import {AuditAction, AuditEntry, NotificationKind, NotificationPayload} from "../types";
import {Maybe} from "purify-ts";

// Ensembles and kits are taxed at this flat rate whatever their products carry.
export const GROUP_VAT_RATE = 0.20;

// Kits without an explicit price sell at 90% of their contents.
export const KIT_FALLBACK_FACTOR = 0.9;

export function effectiveQuantity(quantity: number): number {
    return Math.max(quantity, 1);
}

const sum = (values: readonly number[]): number =>
    values.reduce((total, value) => total + value, 0);

// ============================================================================
// Line Calculations
// ============================================================================

export function calculateProduct(product: Product): ProductCalculation {
    const unitPrice = product.rrp;
    const totalPrice = unitPrice * effectiveQuantity(product.quantity);
    return {
        product,
        unitPrice,
        totalPrice,
        vatAmount: totalPrice * Math.max(product.vatRate, 0),
        discountApplied: 0,
    };
}

export function calculateEnsemble(ensemble: ProductEnsemble): EnsembleCalculation {
    const productCalculations = ensemble.products.map(calculateProduct);
    const baseTotal = sum(productCalculations.map(calc => calc.totalPrice));
    const discountAmount = baseTotal * ensemble.ensembleDiscount;
    const finalTotal = (baseTotal - discountAmount) * effectiveQuantity(ensemble.quantity);

    return {
        ensemble,
        baseTotal,
        discountAmount,
        finalTotal,
        vatAmount: finalTotal * GROUP_VAT_RATE,
        productCalculations,
    };
}

export function defaultKitPrice(kit: ProductKit): number {
    const contents = [...kit.mandatoryProducts, ...kit.optionalProducts];
    return sum(contents.map(product => calculateProduct(product).totalPrice)) * KIT_FALLBACK_FACTOR;
}

export function calculateKit(kit: ProductKit): KitCalculation {
    const kitUnitPrice = Maybe.fromPredicate(price => price > 0, kit.kitPrice)
        .orDefaultLazy(() => defaultKitPrice(kit));
    const totalPrice = kitUnitPrice * effectiveQuantity(kit.quantity);

    return {
        kit,
        kitUnitPrice,
        totalPrice,
        vatAmount: totalPrice * GROUP_VAT_RATE,
        mandatoryProductCalculations: kit.mandatoryProducts.map(calculateProduct),
        optionalProductCalculations: kit.optionalProducts.map(calculateProduct),
    };
}

// ============================================================================
// Discounts
// ============================================================================

/**
 * Every eligibility predicate the code fails at `now`; empty when it applies.
 * `applicableCategories` is not consulted.
 */
export function discountIneligibility(
    code: DiscountCode,
    preDiscountSubtotal: number,
    now: Date
): DiscountIneligibility[] {
    const checks: ReadonlyArray<[boolean, DiscountIneligibility]> = [
        [!code.isActive, 'inactive'],
        // an unparseable bound never admits the code
        [!(code.validFrom.getTime() <= now.getTime()), 'not_yet_valid'],
        [!(now.getTime() <= code.validTo.getTime()), 'expired'],
        [code.currentUsages >= code.maxUsages, 'usage_exhausted'],
        [preDiscountSubtotal < code.minOrderAmount, 'below_minimum_order'],
    ];
    return checks.filter(([failed]) => failed).map(([, reason]) => reason);
}

export function calculateDiscounts(
    codes: readonly DiscountCode[],
    preDiscountSubtotal: number,
    now: Date
): DiscountApplication[] {
    return codes.map(code => {
        const ineligibility = discountIneligibility(code, preDiscountSubtotal, now);
        const amount = ineligibility.length === 0
            ? Math.min(preDiscountSubtotal * code.discountPercentage, code.maxDiscountAmount)
            : 0;
        return {code: code.code, amount, ineligibility};
    });
}

/**
 * Usage accounting for a processed order: the codes that contributed a
 * discount come back with one more usage. Callers apply this after a
 * successful run; pricing itself never counts usages.
 */
export function recordDiscountUsage(
    codes: readonly DiscountCode[],
    calculation: CalculationResult
): DiscountCode[] {
    const contributing = new Set(
        calculation.discountApplications
            .filter(application => application.ineligibility.length === 0)
            .map(application => application.code)
    );
    return codes.map(code => contributing.has(code.code)
        ? {...code, currentUsages: code.currentUsages + 1}
        : code);
}

// ============================================================================
// Order Totals
// ============================================================================

export function computeOrder(order: Order, now: Date = new Date()): CalculationResult {
    const productCalculations = order.individualProducts.map(calculateProduct);
    const ensembleCalculations = order.productEnsembles.map(calculateEnsemble);
    const kitCalculations = order.productKits.map(calculateKit);

    const individualProductsTotal = sum(productCalculations.map(calc => calc.totalPrice));
    const individualProductsVAT = sum(productCalculations.map(calc => calc.vatAmount));
    const ensembleTotal = sum(ensembleCalculations.map(calc => calc.finalTotal));
    const ensembleVAT = sum(ensembleCalculations.map(calc => calc.vatAmount));
    const kitTotal = sum(kitCalculations.map(calc => calc.totalPrice));
    const kitVAT = sum(kitCalculations.map(calc => calc.vatAmount));

    const preDiscountSubtotal = individualProductsTotal + ensembleTotal + kitTotal;
    const discountApplications = calculateDiscounts(order.appliedDiscountCodes, preDiscountSubtotal, now);
    // no cap across codes: several eligible codes may exceed the subtotal
    const totalDiscount = sum(discountApplications.map(application => application.amount));

    const subtotal = preDiscountSubtotal - totalDiscount;
    const totalVAT = individualProductsVAT + ensembleVAT + kitVAT;

    return {
        individualProductsTotal,
        individualProductsVAT,
        ensembleTotal,
        ensembleVAT,
        kitTotal,
        kitVAT,
        totalDiscount,
        subtotal,
        totalVAT,
        grandTotal: subtotal + totalVAT + order.shippingCost,
        productCalculations,
        ensembleCalculations,
        kitCalculations,
        discountApplications,
    };
}

// ============================================================================
// Notifications & Audit Data Preparation
// ============================================================================

const notificationRecipients: Record<NotificationKind, (order: Order, staff: readonly string[]) => string[]> = {
    ORDER_PROCESSED: (order, staff) => [...customerAddress(order), ...staff],
    ORDER_FAILED: (_order, staff) => [...staff],
    ORDER_SHIPPED: (order) => customerAddress(order),
};

function customerAddress(order: Order): string[] {
    return order.customerEmail ? [order.customerEmail] : [];
}

export function buildOrderNotification(
    order: Order,
    result: ProcessingResult,
    kind: NotificationKind,
    staffRecipients: readonly string[]
): NotificationPayload {
    const to = notificationRecipients[kind](order, staffRecipients);

    switch (kind) {
        case 'ORDER_PROCESSED': {
            const totals = result.calculationResults;
            return {
                kind,
                to,
                subject: `Order ${order.id} processed`,
                body: [
                    `Order ${order.id} for customer ${order.customerId} has been processed.`,
                    ...(totals
                        ? [
                            `Subtotal: ${totals.subtotal.toFixed(2)}`,
                            `VAT: ${totals.totalVAT.toFixed(2)}`,
                            `Discount: ${totals.totalDiscount.toFixed(2)}`,
                            `Total: ${totals.grandTotal.toFixed(2)}`,
                        ]
                        : []),
                    `Report: ${result.csvFilePath}`,
                ].join('\n'),
            };
        }
        case 'ORDER_FAILED':
            return {
                kind,
                to,
                subject: `Order ${order.id} failed`,
                body: `Processing of order ${order.id} failed: ${result.errorMessage ?? 'unknown error'}`,
            };
        case 'ORDER_SHIPPED':
            return {
                kind,
                to,
                subject: `Order ${order.id} shipped`,
                body: order.trackingNumber
                    ? `Your order ${order.id} has shipped. Tracking number: ${order.trackingNumber}`
                    : `Your order ${order.id} has shipped.`,
            };
    }
}

export function buildAuditEntry(
    entryId: string,
    action: AuditAction,
    order: Order,
    result: ProcessingResult,
    data: Readonly<Record<string, string>>,
    timestamp: Date
): AuditEntry {
    return {
        entryId,
        action,
        orderId: order.id,
        customerId: order.customerId,
        timestamp,
        success: result.success,
        errorMessage: result.errorMessage,
        data,
    };
}
