import { Candle } from './Candle';
import { TimeSeries } from '../value-objects/TimeSeries';
import { InsufficientDataError } from '../errors/ScreenerErrors';

export class PriceHistory {
    public readonly candles: readonly Candle[];

    constructor(candles: readonly Candle[]) {
        if (candles.length === 0) {
            throw new InsufficientDataError('PriceHistory', 1, 0);
        }

        const ordered = PriceHistory.isAscending(candles)
            ? [...candles]
            : [...candles].sort((a, b) => a.timestamp - b.timestamp);

        this.candles = Object.freeze(ordered);
    }

    get length(): number {
        return this.candles.length;
    }

    get asOf(): Date {
        return this.candles[this.candles.length - 1].date;
    }

    closes(): number[] {
        return this.candles.map(c => c.close);
    }

    closeSeries(): TimeSeries {
        return TimeSeries.from(this.candles.map(c => ({ timestamp: c.timestamp, value: c.close })));
    }

    private static isAscending(candles: readonly Candle[]): boolean {
        for (let i = 1; i < candles.length; i++) {
            if (candles[i].timestamp <= candles[i - 1].timestamp) return false;
        }
        return true;
    }
}
