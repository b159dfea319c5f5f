import { PriceHistory } from '../entities/PriceHistory';
import { DarvasBoxOptions, DarvasBoxResult } from '../types/IndicatorTypes';

export interface IDarvasBoxDetector {
    detect(history: PriceHistory, options?: Partial<DarvasBoxOptions>): DarvasBoxResult;
}
