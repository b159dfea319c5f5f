import { injectable, inject } from 'inversify';
import { PriceHistory } from '../../../domain/entities/PriceHistory';
import { IndicatorResult } from '../../../domain/value-objects/IndicatorResult';
import {
    ChecklistResult,
    DarvasBoxResult,
    GreenLineBreakoutResult,
    MomentumResult,
    RibbonStackResult,
    ScreeningParameters
} from '../../../domain/types/IndicatorTypes';
import { Timeframe } from '../../../domain/enums';
import { IGreenLineDetector } from '../../../domain/interfaces/IGreenLineDetector';
import { IDarvasBoxDetector } from '../../../domain/interfaces/IDarvasBoxDetector';
import { IChecklistStrategy } from '../../../domain/interfaces/IChecklistStrategy';
import { RibbonStackDetector } from '../detection/RibbonStackDetector';
import { MomentumDetector } from '../detection/MomentumDetector';
import { TYPES } from '../../../config/types';

export const INDICATOR_NAMES = {
    greenLine: 'Green Line Breakout',
    darvasBox: 'Darvas Box Breakout',
    ribbon: 'RWB Pattern',
    momentumDaily: 'Momentum Daily',
    momentumWeekly: 'Momentum Weekly',
    checklist: 'GLB Checklist'
} as const;

@injectable()
export class IndicatorReportBuilder {
    constructor(
        @inject(TYPES.IGreenLineDetector) private readonly greenLineDetector: IGreenLineDetector,
        @inject(TYPES.IDarvasBoxDetector) private readonly darvasBoxDetector: IDarvasBoxDetector,
        @inject(TYPES.RibbonStackDetector) private readonly ribbonDetector: RibbonStackDetector,
        @inject(TYPES.MomentumDetector) private readonly momentumDetector: MomentumDetector,
        @inject(TYPES.IChecklistStrategy) private readonly checklist: IChecklistStrategy
    ) { }

    /**
     * Evaluates every indicator once, in report order. The checklist reuses
     * the outcomes computed here. Detector errors propagate.
     */
    build(history: PriceHistory, parameters: ScreeningParameters = {}): IndicatorResult[] {
        const greenLine = this.greenLineDetector.detect(history, parameters.greenLine);
        const darvasBox = this.darvasBoxDetector.detect(history, parameters.darvasBox);
        const ribbon = this.ribbonDetector.detect(history);
        const momentumDaily = this.momentumDetector.detect(history, Timeframe.DAILY);
        const momentumWeekly = this.momentumDetector.detect(history, Timeframe.WEEKLY);
        const checklist = this.checklist.evaluate(history, parameters.checklist, {
            greenLine,
            ribbon,
            momentumDaily,
            momentumWeekly
        });

        return [
            this.greenLineRow(greenLine),
            this.darvasBoxRow(darvasBox),
            this.ribbonRow(ribbon),
            this.momentumRow(INDICATOR_NAMES.momentumDaily, momentumDaily),
            this.momentumRow(INDICATOR_NAMES.momentumWeekly, momentumWeekly),
            this.checklistRow(checklist)
        ];
    }

    private greenLineRow(result: GreenLineBreakoutResult): IndicatorResult {
        return new IndicatorResult(INDICATOR_NAMES.greenLine, result.breakout, {
            priorHigh: result.priorHigh,
            lastClose: result.lastClose,
            monthsSincePriorHigh: result.monthsSincePriorHigh,
            baseMonths: result.baseMonths
        });
    }

    private darvasBoxRow(result: DarvasBoxResult): IndicatorResult {
        return new IndicatorResult(INDICATOR_NAMES.darvasBox, result.breakout, {
            boxHigh: result.boxHigh,
            boxLow: result.boxLow,
            breakoutMargin: result.breakoutMargin
        });
    }

    private ribbonRow(result: RibbonStackResult): IndicatorResult {
        return new IndicatorResult(INDICATOR_NAMES.ribbon, result.rwb, {
            ribbonSpread: result.ribbonSpread
        });
    }

    private momentumRow(name: string, result: MomentumResult): IndicatorResult {
        return new IndicatorResult(name, result.isOn, {
            macd: result.macd,
            signal: result.signal,
            slopePositive: result.slopePositive
        });
    }

    private checklistRow(result: ChecklistResult): IndicatorResult {
        return new IndicatorResult(INDICATOR_NAMES.checklist, result.qualifies, {
            greenLine: result.greenLine.breakout,
            rwb: result.ribbon.rwb,
            momentumDaily: result.momentumDaily.isOn,
            momentumWeekly: result.momentumWeekly.isOn,
            lastVolume: result.lastVolume,
            averageVolume: result.averageVolume,
            volumeRatio: result.volumeRatio,
            volumeRequirement: result.volumeRequirement,
            volumeOk: result.volumeOk
        });
    }
}
