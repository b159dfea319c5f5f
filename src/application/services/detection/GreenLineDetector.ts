import { injectable, inject } from 'inversify';
import { IGreenLineDetector } from '../../../domain/interfaces/IGreenLineDetector';
import { IResampler } from '../../../domain/interfaces/IResampler';
import { PriceHistory } from '../../../domain/entities/PriceHistory';
import { GreenLineBreakoutResult, GreenLineOptions } from '../../../domain/types/IndicatorTypes';
import { ResampleFrequency } from '../../../domain/enums/ResampleFrequency';
import { InsufficientDataError, InvalidParameterError } from '../../../domain/errors/ScreenerErrors';
import { monthOrdinal } from '../indicators/Resampler';
import { ScreenerConfig } from '../../../config/screener.config';
import { withDefaults } from '../../../shared/utils/options';
import { TYPES } from '../../../config/types';

@injectable()
export class GreenLineDetector implements IGreenLineDetector {
    constructor(
        @inject(TYPES.IResampler) private readonly resampler: IResampler
    ) { }

    /**
     * Green Line Breakout.
     *
     * The green line is the highest monthly close before the current month.
     * It needs at least `minBaseMonths` monthly closes after it, all below it,
     * and the latest weekly close above it.
     *
     * `minBaseMonths` must be an integer. Zero or a negative value drops the
     * base requirement, and at -1 a single monthly close is enough to report
     * a result with no green line.
     */
    detect(history: PriceHistory, options: Partial<GreenLineOptions> = {}): GreenLineBreakoutResult {
        const { minBaseMonths } = withDefaults<GreenLineOptions>(ScreenerConfig.greenLine, options);
        if (!Number.isInteger(minBaseMonths)) {
            throw new InvalidParameterError('minBaseMonths', `minBaseMonths must be an integer (got ${minBaseMonths})`);
        }

        const closes = history.closeSeries();
        const monthly = this.resampler.resample(closes, ResampleFrequency.MONTHLY);
        const required = minBaseMonths + 2;
        if (monthly.length < required) {
            throw new InsufficientDataError('Green Line Breakout', required, monthly.length);
        }

        const monthlyPoints = monthly.toArray();
        const finalMonth = monthlyPoints[monthlyPoints.length - 1];
        const priorMonths = monthlyPoints.slice(0, -1);

        if (priorMonths.length === 0) {
            return Object.freeze({
                breakout: false,
                priorHigh: null,
                lastClose: finalMonth.value,
                monthsSincePriorHigh: null,
                baseMonths: 0
            });
        }

        const priorHigh = Math.max(...priorMonths.map(p => p.value));

        // Ties go to the most recent month at the high
        let highIndex = priorMonths.length - 1;
        while (priorMonths[highIndex].value !== priorHigh) {
            highIndex--;
        }

        const base = priorMonths.slice(highIndex + 1);
        const baseBelowHigh = base.every(p => p.value < priorHigh);
        const monthsSincePriorHigh =
            monthOrdinal(finalMonth.timestamp) - monthOrdinal(priorMonths[highIndex].timestamp);

        const lastClose = this.confirmingClose(history);

        return Object.freeze({
            breakout: lastClose > priorHigh && base.length >= minBaseMonths && baseBelowHigh,
            priorHigh,
            lastClose,
            monthsSincePriorHigh,
            baseMonths: base.length
        });
    }

    private confirmingClose(history: PriceHistory): number {
        const weekly = this.resampler.resample(history.closeSeries(), ResampleFrequency.WEEKLY);
        const lastWeek = weekly.last();
        if (lastWeek) return lastWeek.value;

        const closes = history.closes();
        return closes[closes.length - 1];
    }
}
