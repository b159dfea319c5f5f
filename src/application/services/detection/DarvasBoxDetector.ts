import { injectable } from 'inversify';
import { IDarvasBoxDetector } from '../../../domain/interfaces/IDarvasBoxDetector';
import { PriceHistory } from '../../../domain/entities/PriceHistory';
import { DarvasBoxOptions, DarvasBoxResult } from '../../../domain/types/IndicatorTypes';
import { InsufficientDataError, InvalidParameterError } from '../../../domain/errors/ScreenerErrors';
import { ScreenerConfig } from '../../../config/screener.config';
import { withDefaults } from '../../../shared/utils/options';

@injectable()
export class DarvasBoxDetector implements IDarvasBoxDetector {

    /**
     * Darvas Box breakout.
     *
     * The box is the `lookbackDays` closes that precede the current rising leg.
     * It is valid when its range is within `maxVolatility` of the box low, and
     * the latest close breaks out when it clears the box top by `breakoutBuffer`.
     */
    detect(history: PriceHistory, options: Partial<DarvasBoxOptions> = {}): DarvasBoxResult {
        const { lookbackDays, maxVolatility, breakoutBuffer } = withDefaults<DarvasBoxOptions>(ScreenerConfig.darvasBox, options);

        if (!Number.isInteger(lookbackDays) || lookbackDays <= 0) {
            throw new InvalidParameterError('lookbackDays', `lookbackDays must be a positive integer (got ${lookbackDays})`);
        }

        const closes = history.closes();
        if (closes.length < lookbackDays) {
            throw new InsufficientDataError('Darvas Box Breakout', lookbackDays, closes.length);
        }

        const box = this.findBox(closes, lookbackDays);
        const boxHigh = Math.max(...box);
        const boxLow = Math.min(...box);
        const volatility = boxLow > 0 ? (boxHigh - boxLow) / boxLow : Infinity;
        const lastClose = closes[closes.length - 1];

        return Object.freeze({
            breakout: volatility <= maxVolatility && lastClose >= boxHigh * (1 + breakoutBuffer),
            boxHigh,
            boxLow,
            breakoutMargin: lastClose / boxHigh - 1
        });
    }

    /**
     * Window of `lookbackDays` closes ending just before the trailing run of
     * strictly rising closes. Falls back to the first `lookbackDays` closes
     * when the run leaves too little history in front of it.
     *
     * The box moves with the last close: a single close that does not rise
     * ends the leg there, so the box then takes in the advance and the
     * verdict usually flips to no breakout.
     */
    private findBox(closes: number[], lookbackDays: number): number[] {
        let legStart = closes.length - 1;
        while (legStart > 0 && closes[legStart] > closes[legStart - 1]) {
            legStart--;
        }

        const boxEnd = Math.max(legStart + 1, lookbackDays);
        return closes.slice(boxEnd - lookbackDays, boxEnd);
    }
}
