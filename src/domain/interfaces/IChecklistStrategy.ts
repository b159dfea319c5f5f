import { PriceHistory } from '../entities/PriceHistory';
import { ChecklistOptions, ChecklistOverrides, ChecklistResult } from '../types/IndicatorTypes';

export interface IChecklistStrategy {
    evaluate(
        history: PriceHistory,
        options?: Partial<ChecklistOptions>,
        overrides?: ChecklistOverrides
    ): ChecklistResult;
}
