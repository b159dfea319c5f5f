import { PriceHistory } from '../entities/PriceHistory';
import { GreenLineBreakoutResult, GreenLineOptions } from '../types/IndicatorTypes';

export interface IGreenLineDetector {
    detect(history: PriceHistory, options?: Partial<GreenLineOptions>): GreenLineBreakoutResult;
}
