import { injectable } from 'inversify';
import { IIndicators, MacdSeries } from '../../../domain/interfaces/IIndicators';
import { ScreenerConfig } from '../../../config/screener.config';
import { InvalidParameterError } from '../../../domain/errors/ScreenerErrors';

@injectable()
export class IndicatorsProvider implements IIndicators {

    /**
     * Recursive EMA seeded with the first value (no SMA warm-up), so every
     * index has a value.
     */
    ema(values: readonly number[], span: number): number[] {
        this.assertPositive('span', span);
        if (values.length === 0) return [];

        const results: number[] = [];
        const k = 2 / (span + 1);

        let ema = values[0];
        results.push(ema);

        for (let i = 1; i < values.length; i++) {
            ema = (values[i] * k) + (ema * (1 - k));
            results.push(ema);
        }

        return results;
    }

    /**
     * Trailing SMA aligned with the input; the first `window - 1` slots are null.
     */
    sma(values: readonly number[], window: number): (number | null)[] {
        this.assertPositive('window', window);
        const results: (number | null)[] = [];

        for (let i = 0; i < values.length; i++) {
            if (i < window - 1) {
                results.push(null);
                continue;
            }
            const slice = values.slice(i - window + 1, i + 1);
            results.push(slice.reduce((sum, val) => sum + val, 0) / window);
        }

        return results;
    }

    macd(
        values: readonly number[],
        fast: number = ScreenerConfig.momentum.fastPeriod,
        slow: number = ScreenerConfig.momentum.slowPeriod,
        signal: number = ScreenerConfig.momentum.signalPeriod
    ): MacdSeries {
        const fastEma = this.ema(values, fast);
        const slowEma = this.ema(values, slow);
        const macd = fastEma.map((value, i) => value - slowEma[i]);

        return {
            macd,
            signal: this.ema(macd, signal)
        };
    }

    trailingMean(values: readonly number[], window: number): number | null {
        this.assertPositive('window', window);
        if (values.length < window) return null;
        const slice = values.slice(-window);
        return slice.reduce((sum, val) => sum + val, 0) / window;
    }

    private assertPositive(name: string, value: number): void {
        if (!Number.isInteger(value) || value <= 0) {
            throw new InvalidParameterError(name, `${name} must be a positive integer (got ${value})`);
        }
    }
}
