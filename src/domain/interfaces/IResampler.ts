import { TimeSeries } from '../value-objects/TimeSeries';
import { ResampleFrequency } from '../enums/ResampleFrequency';

export interface IResampler {
    resample(series: TimeSeries, frequency: ResampleFrequency): TimeSeries;
}
