import { injectable, inject } from 'inversify';
import { PriceHistory } from '../../../domain/entities/PriceHistory';
import { RibbonStackResult } from '../../../domain/types/IndicatorTypes';
import { IIndicators } from '../../../domain/interfaces/IIndicators';
import { InsufficientDataError } from '../../../domain/errors/ScreenerErrors';
import { TYPES } from '../../../config/types';
import { ScreenerConfig } from '../../../config/screener.config';

@injectable()
export class RibbonStackDetector {
    constructor(
        @inject(TYPES.IIndicators) private readonly indicators: IIndicators
    ) { }

    /**
     * RWB (red-white-blue) ribbon: the six short EMAs (3..15) sit entirely
     * above the six long EMAs (30..60) and price is above all of them.
     */
    public detect(history: PriceHistory): RibbonStackResult {
        const { shortSpans, longSpans, warmupBars } = ScreenerConfig.ribbon;
        const closes = history.closes();

        const required = Math.max(...longSpans) + warmupBars;
        if (closes.length < required) {
            throw new InsufficientDataError('RWB Pattern', required, closes.length);
        }

        const latestShort = this.latestEmas(closes, shortSpans);
        const latestLong = this.latestEmas(closes, longSpans);
        const currentPrice = closes[closes.length - 1];

        const ribbonSeparated = Math.min(...latestShort) > Math.max(...latestLong);
        const priceAboveRibbon = currentPrice > Math.max(...latestShort);

        return Object.freeze({
            rwb: ribbonSeparated && priceAboveRibbon,
            ribbonSpread: this.mean(latestShort) - this.mean(latestLong)
        });
    }

    private latestEmas(closes: number[], spans: readonly number[]): number[] {
        return spans.map(span => {
            const ema = this.indicators.ema(closes, span);
            return ema[ema.length - 1];
        });
    }

    private mean(values: number[]): number {
        return values.reduce((sum, val) => sum + val, 0) / values.length;
    }
}
