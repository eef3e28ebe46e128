import {ReportFormatter} from '../types';
import {standardRetailAudit} from './standardRetailAudit';
import {enhancedRetailAudit} from './enhancedRetailAudit';
import {financialSummary} from './financialSummary';

export {standardRetailAudit, enhancedRetailAudit, financialSummary};
export {escapeCsvField} from './csv';

/**
 * The built-in formats by registration name, in registration order. The
 * first entry is the fallback when no default strategy is configured.
 */
export function defaultFormatters(): ReadonlyArray<readonly [string, ReportFormatter]> {
    return [
        ['Standard', standardRetailAudit],
        ['Enhanced', enhancedRetailAudit],
        ['Financial', financialSummary],
    ];
}
