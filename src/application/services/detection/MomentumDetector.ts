import { injectable, inject } from 'inversify';
import { PriceHistory } from '../../../domain/entities/PriceHistory';
import { MomentumResult } from '../../../domain/types/IndicatorTypes';
import { IIndicators } from '../../../domain/interfaces/IIndicators';
import { IResampler } from '../../../domain/interfaces/IResampler';
import { Timeframe, ResampleFrequency } from '../../../domain/enums';
import { InsufficientDataError, InvalidParameterError } from '../../../domain/errors/ScreenerErrors';
import { TYPES } from '../../../config/types';
import { ScreenerConfig } from '../../../config/screener.config';

const TIMEFRAMES: readonly Timeframe[] = [Timeframe.DAILY, Timeframe.WEEKLY];

export function parseTimeframe(value: string): Timeframe {
    const timeframe = TIMEFRAMES.find(t => t === value);
    if (!timeframe) {
        throw new InvalidParameterError('timeframe', `timeframe must be 'D' or 'W' (got '${value}')`);
    }
    return timeframe;
}

@injectable()
export class MomentumDetector {
    constructor(
        @inject(TYPES.IIndicators) private readonly indicators: IIndicators,
        @inject(TYPES.IResampler) private readonly resampler: IResampler
    ) { }

    /**
     * Bongo momentum: MACD above its signal line while the 10-bar SMA slopes up.
     * The weekly variant runs the same test on Friday closes.
     */
    public detect(history: PriceHistory, timeframe: string = Timeframe.DAILY): MomentumResult {
        const checkedTimeframe = parseTimeframe(timeframe);
        const closes = this.closesFor(history, checkedTimeframe);

        const { minBars, fastPeriod, slowPeriod, signalPeriod, slopeWindow, slopeLookback } = ScreenerConfig.momentum;
        if (closes.length < minBars) {
            throw new InsufficientDataError(`Momentum ${this.label(checkedTimeframe)}`, minBars, closes.length);
        }

        const { macd, signal } = this.indicators.macd(closes, fastPeriod, slowPeriod, signalPeriod);
        const currentMacd = macd[macd.length - 1];
        const currentSignal = signal[signal.length - 1];
        const slopePositive = this.isSlopePositive(closes, slopeWindow, slopeLookback);

        return Object.freeze({
            timeframe: checkedTimeframe,
            isOn: currentMacd > currentSignal && slopePositive,
            macd: currentMacd,
            signal: currentSignal,
            slopePositive
        });
    }

    private closesFor(history: PriceHistory, timeframe: Timeframe): number[] {
        if (timeframe === Timeframe.WEEKLY) {
            return this.resampler.resample(history.closeSeries(), ResampleFrequency.WEEKLY).values();
        }
        return history.closes();
    }

    private isSlopePositive(closes: number[], window: number, lookback: number): boolean {
        const ma = this.indicators.sma(closes, window);
        const current = ma[ma.length - 1];
        const previous = ma[ma.length - 1 - lookback];
        if (current === null || previous === null) return false;
        return current - previous > 0;
    }

    private label(timeframe: Timeframe): string {
        return timeframe === Timeframe.WEEKLY ? 'Weekly' : 'Daily';
    }
}
