/**
 * ORDER VALIDATION
 *
 * Hard errors block processing; warnings are reported and let the order
 * through. Nothing here throws.
 */

import {DiscountCode, Order, Product, ProductEnsemble, ProductKit} from '../domain';
import {ValidationResult} from "./types";
import {Either, NonEmptyList} from "purify-ts";

export const ORDER_STATUSES = ['Pending', 'Processing', 'Shipped', 'Delivered', 'Cancelled'] as const;

type Findings = {
    readonly errors: string[];
    readonly warnings: string[];
};

const noFindings = (): Findings => ({errors: [], warnings: []});

const merge = (...findings: Findings[]): Findings => ({
    errors: findings.flatMap(f => f.errors),
    warnings: findings.flatMap(f => f.warnings),
});

const isBlank = (value: string | undefined): boolean => !value;

const isInvalidDate = (value: Date): boolean => Number.isNaN(value.getTime());

const outsideUnitRange = (value: number): boolean => value < 0 || value > 1;

export function validateProduct(product: Product, context: string): Findings {
    const findings = noFindings();
    const label = `${context} ${product.name}`;

    if (isBlank(product.id)) findings.errors.push(`${context}: Product ID is required`);
    if (isBlank(product.name)) findings.errors.push(`${context}: Product name is required`);
    if (product.rrp < 0) findings.errors.push(`${label}: RRP cannot be negative`);
    if (outsideUnitRange(product.vatRate)) findings.errors.push(`${label}: VAT rate must be between 0 and 1`);

    if (product.quantity <= 0) findings.warnings.push(`${label}: Quantity is zero or negative`);
    if (isBlank(product.category)) findings.warnings.push(`${label}: Category is not specified`);
    if (isBlank(product.supplier)) findings.warnings.push(`${label}: Supplier is not specified`);

    return findings;
}

function validateEnsemble(ensemble: ProductEnsemble): Findings {
    const findings = noFindings();

    if (isBlank(ensemble.id)) findings.errors.push('Ensemble ID is required');
    if (ensemble.quantity <= 0) findings.warnings.push(`Ensemble ${ensemble.name} has zero or negative quantity`);
    if (outsideUnitRange(ensemble.ensembleDiscount)) {
        findings.errors.push(`Ensemble ${ensemble.name} discount must be between 0 and 1`);
    }

    return merge(
        findings,
        ...ensemble.products.map(product => validateProduct(product, `Ensemble Product (${ensemble.name})`))
    );
}

function validateKit(kit: ProductKit): Findings {
    const findings = noFindings();

    if (isBlank(kit.id)) findings.errors.push('Kit ID is required');
    if (kit.quantity <= 0) findings.warnings.push(`Kit ${kit.name} has zero or negative quantity`);
    if (kit.kitPrice < 0) findings.errors.push(`Kit ${kit.name} price cannot be negative`);
    if (kit.mandatoryProducts.length === 0) findings.warnings.push(`Kit ${kit.name} has no mandatory products`);

    return merge(
        findings,
        ...kit.mandatoryProducts.map(product => validateProduct(product, `Kit Mandatory Product (${kit.name})`)),
        ...kit.optionalProducts.map(product => validateProduct(product, `Kit Optional Product (${kit.name})`))
    );
}

function validateDiscountCode(discount: DiscountCode): Findings {
    const findings = noFindings();

    if (isBlank(discount.code)) findings.errors.push('Discount code cannot be empty');
    if (outsideUnitRange(discount.discountPercentage)) {
        findings.errors.push(`Discount code ${discount.code} percentage must be between 0 and 1`);
    }
    if (isInvalidDate(discount.validFrom) || isInvalidDate(discount.validTo)) {
        findings.errors.push(`Discount code ${discount.code} has an unparseable validity date`);
    } else if (discount.validFrom.getTime() > discount.validTo.getTime()) {
        findings.errors.push(`Discount code ${discount.code} has invalid date range`);
    }
    if (discount.currentUsages > discount.maxUsages) {
        findings.errors.push(`Discount code ${discount.code} has exceeded maximum usages`);
    }

    return findings;
}

function validateHeader(order: Order, now: Date): Findings {
    const findings = noFindings();

    if (isBlank(order.id)) findings.errors.push('Order ID is required');
    if (isBlank(order.customerId)) findings.errors.push('Customer ID is required');
    if (order.orderDate === null || isInvalidDate(order.orderDate)) {
        findings.errors.push('Order date is required');
    } else if (order.orderDate.getTime() > now.getTime()) {
        findings.errors.push('Order date cannot be in the future');
    }

    if (order.individualProducts.length === 0 && order.productEnsembles.length === 0 && order.productKits.length === 0) {
        findings.errors.push('Order must contain at least one product, ensemble, or kit');
    }

    return findings;
}

function validatePayment(order: Order): Findings {
    const findings = noFindings();
    const payment = order.paymentMethod;

    if (payment === null) {
        findings.errors.push('Payment method is required');
        return findings;
    }
    if (isBlank(payment.type)) findings.errors.push('Payment method type is required');
    if (isBlank(payment.transactionId)) findings.warnings.push('Payment transaction ID is missing');
    if (payment.processingFee < 0) findings.errors.push('Payment processing fee cannot be negative');

    return findings;
}

function validateFinancials(order: Order): Findings {
    const findings = noFindings();

    if (order.actualPricePaid < 0) findings.errors.push('Actual price paid cannot be negative');
    if (order.shippingCost < 0) findings.errors.push('Shipping cost cannot be negative');

    const knownStatuses: readonly string[] = ORDER_STATUSES;
    if (!knownStatuses.includes(order.status)) {
        findings.warnings.push(`Order status '${order.status}' is not a standard status`);
    }

    return findings;
}

export function validateOrder(order: Order, now: Date = new Date()): ValidationResult {
    const {errors, warnings} = merge(
        validateHeader(order, now),
        ...order.individualProducts.map(product => validateProduct(product, 'Individual Product')),
        ...order.productEnsembles.map(validateEnsemble),
        ...order.productKits.map(validateKit),
        validatePayment(order),
        ...order.appliedDiscountCodes.map(validateDiscountCode),
        validateFinancials(order)
    );

    return {isValid: errors.length === 0, errors, warnings};
}

/**
 * Lift a validation result into an Either: Left with the hard errors when
 * there are any, Right with the full result otherwise.
 */
export function validationOutcome(result: ValidationResult): Either<NonEmptyList<string>, ValidationResult> {
    return NonEmptyList.fromArray(result.errors)
        .toEither(result)
        .swap();
}
