// Module product types

import {CalculationResult, Order} from "../domain";

export type ValidationResult = {
    readonly isValid: boolean;
    readonly errors: readonly string[];
    readonly warnings: readonly string[];
};

/**
 * A report format. Implementations are pure: the same order and results
 * always give the same text, and neither argument is touched.
 */
export interface ReportFormatter {
    readonly description: string;
    generate(order: Order, results: CalculationResult): string;
    /**
     * @param generatedAt stamped into the name; defaults to the current time
     */
    fileName(order: Order, generatedAt?: Date): string;
}

export type OrderType = 'Mixed' | 'Kit-Only' | 'Ensemble-Only' | 'Individual-Only' | 'Empty';
