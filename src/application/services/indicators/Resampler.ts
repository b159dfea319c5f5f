import { injectable } from 'inversify';
import { IResampler } from '../../../domain/interfaces/IResampler';
import { TimeSeries, SeriesPoint } from '../../../domain/value-objects/TimeSeries';
import { ResampleFrequency } from '../../../domain/enums/ResampleFrequency';

const DAY_MS = 24 * 60 * 60 * 1000;
const FRIDAY = 5;

/**
 * Calendar month index (year * 12 + month), used to count months between
 * two period labels.
 */
export function monthOrdinal(timestamp: number): number {
    const date = new Date(timestamp);
    return date.getUTCFullYear() * 12 + date.getUTCMonth();
}

@injectable()
export class Resampler implements IResampler {

    /**
     * Last observation of each period. Empty periods are skipped, never filled.
     */
    resample(series: TimeSeries, frequency: ResampleFrequency): TimeSeries {
        const labelOf = frequency === ResampleFrequency.MONTHLY
            ? Resampler.monthEnd
            : Resampler.weekEndingFriday;

        const buckets = new Map<number, SeriesPoint>();
        for (const point of series.toArray()) {
            const label = labelOf(point.timestamp);
            // Map keeps first-insertion order, later points overwrite the value
            buckets.set(label, { timestamp: label, value: point.value });
        }

        return TimeSeries.from([...buckets.values()]);
    }

    private static monthEnd(timestamp: number): number {
        const date = new Date(timestamp);
        return Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0);
    }

    // Saturday and Sunday roll forward into the next Friday's week
    private static weekEndingFriday(timestamp: number): number {
        const date = new Date(timestamp);
        const midnight = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
        const daysToFriday = (FRIDAY - date.getUTCDay() + 7) % 7;
        return midnight + daysToFriday * DAY_MS;
    }
}
