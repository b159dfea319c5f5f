import { Candle } from '../../src/domain/entities/Candle';
import { PriceHistory } from '../../src/domain/entities/PriceHistory';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * `count` weekday timestamps (UTC midnight) starting at `start`.
 */
export function businessDays(start: string, count: number): number[] {
    const days: number[] = [];
    let ts = Date.parse(start);
    while (days.length < count) {
        const weekday = new Date(ts).getUTCDay();
        if (weekday !== 0 && weekday !== 6) days.push(ts);
        ts += DAY_MS;
    }
    return days;
}

export function candle(timestamp: number, close: number, volume: number | null = 1000): Candle {
    return new Candle(timestamp, close, close, close, close, close, volume);
}

export function buildHistory(
    closes: number[],
    options: { start?: string; volumes?: (number | null)[] } = {}
): PriceHistory {
    const timestamps = businessDays(options.start ?? '2023-01-02', closes.length);
    return new PriceHistory(closes.map((close, i) =>
        candle(timestamps[i], close, options.volumes ? options.volumes[i] : 1000)
    ));
}

/**
 * One candle per month, stamped on the given dates.
 */
export function monthlyHistory(dates: string[], closes: number[]): PriceHistory {
    return new PriceHistory(dates.map((date, i) => candle(Date.parse(date), closes[i])));
}

/**
 * 281 sessions (2021-01-04 .. 2022-01-31): a run up to 59.5, a pullback, a
 * flat base at 45, then a steady advance to 61.2. Every component of the
 * checklist fires on the last bar.
 */
export function glbSetupCloses(): number[] {
    const closes: number[] = [];
    for (let i = 0; i < 281; i++) {
        if (i < 40) closes.push(40 + 0.5 * i);
        else if (i < 60) closes.push(59 - 0.7 * (i - 40));
        else if (i < 200) closes.push(45);
        else closes.push(45 + 0.2 * (i - 199));
    }
    return closes;
}

export function glbSetupHistory(lastVolume = 2000): PriceHistory {
    const volumes = Array.from({ length: 280 }, () => 1000);
    volumes.push(lastVolume);
    return buildHistory(glbSetupCloses(), { start: '2021-01-04', volumes });
}

export function linear(count: number, start: number, step: number): number[] {
    const values: number[] = [];
    for (let i = 0; i < count; i++) values.push(start + step * i);
    return values;
}
