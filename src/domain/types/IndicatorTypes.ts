import { Timeframe } from '../enums/Timeframe';
export { Timeframe };

// null marks a metric that could not be computed

export interface GreenLineBreakoutResult {
    readonly breakout: boolean;
    readonly priorHigh: number | null;
    readonly lastClose: number;
    readonly monthsSincePriorHigh: number | null;
    readonly baseMonths: number;
}

export interface DarvasBoxResult {
    readonly breakout: boolean;
    readonly boxHigh: number;
    readonly boxLow: number;
    readonly breakoutMargin: number;
}

export interface RibbonStackResult {
    readonly rwb: boolean;
    readonly ribbonSpread: number;
}

export interface MomentumResult {
    readonly timeframe: Timeframe;
    readonly isOn: boolean;
    readonly macd: number;
    readonly signal: number;
    readonly slopePositive: boolean;
}

export interface ChecklistResult {
    readonly qualifies: boolean;
    readonly greenLine: GreenLineBreakoutResult;
    readonly ribbon: RibbonStackResult;
    readonly momentumDaily: MomentumResult;
    readonly momentumWeekly: MomentumResult;
    readonly lastVolume: number | null;
    readonly averageVolume: number | null;
    readonly volumeRatio: number | null;
    readonly volumeRequirement: number;
    readonly volumeOk: boolean;
}

export interface GreenLineOptions {
    minBaseMonths: number;
}

export interface DarvasBoxOptions {
    lookbackDays: number;
    maxVolatility: number;
    breakoutBuffer: number;
}

export interface ChecklistOptions {
    volumeWindow: number;
    breakoutVolumeMultiple: number;
}

/**
 * Outcomes already computed by the caller. Each one is used as-is.
 */
export interface ChecklistOverrides {
    greenLine?: GreenLineBreakoutResult;
    ribbon?: RibbonStackResult;
    momentumDaily?: MomentumResult;
    momentumWeekly?: MomentumResult;
}

export interface ScreeningParameters {
    greenLine?: Partial<GreenLineOptions>;
    darvasBox?: Partial<DarvasBoxOptions>;
    checklist?: Partial<ChecklistOptions>;
}
