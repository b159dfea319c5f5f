export { Timeframe } from './Timeframe';
export { ResampleFrequency } from './ResampleFrequency';
