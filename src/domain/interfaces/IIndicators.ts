export interface MacdSeries {
    macd: number[];
    signal: number[];
}

export interface IIndicators {
    ema(values: readonly number[], span: number): number[];
    sma(values: readonly number[], window: number): (number | null)[];
    macd(values: readonly number[], fast?: number, slow?: number, signal?: number): MacdSeries;
    trailingMean(values: readonly number[], window: number): number | null;
}
