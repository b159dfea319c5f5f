import { Resampler, monthOrdinal } from '../../../../src/application/services/indicators/Resampler';
import { TimeSeries } from '../../../../src/domain/value-objects/TimeSeries';
import { ResampleFrequency } from '../../../../src/domain/enums';

const utc = (date: string) => Date.parse(date);

describe('Resampler', () => {
    const resampler = new Resampler();

    it('keeps the last close of each month, labelled with the month end', () => {
        const series = TimeSeries.fromArrays(
            [utc('2024-01-02'), utc('2024-01-31'), utc('2024-02-01'), utc('2024-02-15')],
            [1, 2, 3, 4]
        );

        const monthly = resampler.resample(series, ResampleFrequency.MONTHLY);

        expect(monthly.values()).toEqual([2, 4]);
        expect(monthly.timestamps()).toEqual([utc('2024-01-31'), utc('2024-02-29')]);
    });

    it('skips months without observations', () => {
        const series = TimeSeries.fromArrays([utc('2024-01-10'), utc('2024-04-10')], [1, 2]);
        expect(resampler.resample(series, ResampleFrequency.MONTHLY)).toHaveLength(2);
    });

    it('groups weeks ending on Friday', () => {
        // Mon 2024-01-01 .. Fri 2024-01-05, then Mon 2024-01-08
        const series = TimeSeries.fromArrays(
            [utc('2024-01-01'), utc('2024-01-03'), utc('2024-01-05'), utc('2024-01-08')],
            [1, 2, 3, 4]
        );

        const weekly = resampler.resample(series, ResampleFrequency.WEEKLY);

        expect(weekly.values()).toEqual([3, 4]);
        expect(weekly.timestamps()).toEqual([utc('2024-01-05'), utc('2024-01-12')]);
    });

    it('rolls weekend observations into the following week', () => {
        const series = TimeSeries.fromArrays([utc('2024-01-05'), utc('2024-01-06')], [1, 2]);
        const weekly = resampler.resample(series, ResampleFrequency.WEEKLY);

        expect(weekly.values()).toEqual([1, 2]);
        expect(weekly.timestamps()).toEqual([utc('2024-01-05'), utc('2024-01-12')]);
    });

    it('returns an empty series for empty input', () => {
        expect(resampler.resample(TimeSeries.from([]), ResampleFrequency.WEEKLY).isEmpty).toBe(true);
    });
});

describe('monthOrdinal', () => {
    it('counts calendar months across years', () => {
        expect(monthOrdinal(utc('2022-01-31')) - monthOrdinal(utc('2021-02-26'))).toBe(11);
    });
});
