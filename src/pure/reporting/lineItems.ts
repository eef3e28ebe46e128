import {CalculationResult, ProductCalculation} from '../../domain';

export type LineItemGroup = 'Individual' | 'Ensemble' | 'Kit-Mandatory' | 'Kit-Optional';

export type ReportLineItem = {
    readonly group: LineItemGroup;
    // ensemble theme or kit type, empty for individual products
    readonly groupLabel: string;
    readonly calculation: ProductCalculation;
};

/**
 * Flatten the calculation into report lines: individual products, then each
 * ensemble's products, then each kit's mandatory and optional products.
 */
export function reportLineItems(results: CalculationResult): ReportLineItem[] {
    return [
        ...results.productCalculations.map(calculation => ({
            group: 'Individual' as const,
            groupLabel: '',
            calculation,
        })),
        ...results.ensembleCalculations.flatMap(ensembleCalc =>
            ensembleCalc.productCalculations.map(calculation => ({
                group: 'Ensemble' as const,
                groupLabel: ensembleCalc.ensemble.theme,
                calculation,
            }))),
        ...results.kitCalculations.flatMap(kitCalc => [
            ...kitCalc.mandatoryProductCalculations.map(calculation => ({
                group: 'Kit-Mandatory' as const,
                groupLabel: kitCalc.kit.kitType,
                calculation,
            })),
            ...kitCalc.optionalProductCalculations.map(calculation => ({
                group: 'Kit-Optional' as const,
                groupLabel: kitCalc.kit.kitType,
                calculation,
            })),
        ]),
    ];
}
