/**
 * Green Line Breakout checklist.
 *
 * A setup qualifies only when every component agrees at the latest bar:
 * 1. Green line breakout
 * 2. RWB ribbon stack
 * 3. Daily momentum on
 * 4. Weekly momentum on
 * 5. Breakout volume at least `breakoutVolumeMultiple` x its trailing average
 */

import { injectable, inject } from 'inversify';
import { PriceHistory } from '../../domain/entities/PriceHistory';
import { Timeframe } from '../../domain/enums';
import {
    ChecklistOptions,
    ChecklistOverrides,
    ChecklistResult
} from '../../domain/types/IndicatorTypes';
import { IChecklistStrategy } from '../../domain/interfaces/IChecklistStrategy';
import { IGreenLineDetector } from '../../domain/interfaces/IGreenLineDetector';
import { IIndicators } from '../../domain/interfaces/IIndicators';
import { RibbonStackDetector } from '../services/detection/RibbonStackDetector';
import { MomentumDetector } from '../services/detection/MomentumDetector';
import { TYPES } from '../../config/types';
import { ScreenerConfig } from '../../config/screener.config';
import { withDefaults } from '../../shared/utils/options';
import { Logger } from '../../shared/logger/Logger';

interface VolumeCheck {
    lastVolume: number | null;
    averageVolume: number | null;
    volumeRatio: number | null;
    volumeOk: boolean;
}

@injectable()
export class GlbChecklistStrategy implements IChecklistStrategy {
    private logger = Logger.getInstance();

    constructor(
        @inject(TYPES.IGreenLineDetector) private readonly greenLineDetector: IGreenLineDetector,
        @inject(TYPES.RibbonStackDetector) private readonly ribbonDetector: RibbonStackDetector,
        @inject(TYPES.MomentumDetector) private readonly momentumDetector: MomentumDetector,
        @inject(TYPES.IIndicators) private readonly indicators: IIndicators
    ) { }

    public evaluate(
        history: PriceHistory,
        options: Partial<ChecklistOptions> = {},
        overrides: ChecklistOverrides = {}
    ): ChecklistResult {
        const { volumeWindow, breakoutVolumeMultiple } =
            withDefaults<ChecklistOptions>(ScreenerConfig.checklist, options);

        const greenLine = overrides.greenLine ?? this.greenLineDetector.detect(history);
        const ribbon = overrides.ribbon ?? this.ribbonDetector.detect(history);
        const momentumDaily = overrides.momentumDaily ?? this.momentumDetector.detect(history, Timeframe.DAILY);
        const momentumWeekly = overrides.momentumWeekly ?? this.momentumDetector.detect(history, Timeframe.WEEKLY);

        const volume = this.checkVolume(history, volumeWindow, breakoutVolumeMultiple);

        const qualifies =
            greenLine.breakout &&
            ribbon.rwb &&
            momentumDaily.isOn &&
            momentumWeekly.isOn &&
            volume.volumeOk;

        this.logger.debug(
            `Checklist: GLB=${greenLine.breakout} RWB=${ribbon.rwb} ` +
            `D=${momentumDaily.isOn} W=${momentumWeekly.isOn} VOL=${volume.volumeOk}`
        );

        return Object.freeze({
            qualifies,
            greenLine,
            ribbon,
            momentumDaily,
            momentumWeekly,
            ...volume,
            volumeRequirement: breakoutVolumeMultiple
        });
    }

    private checkVolume(history: PriceHistory, window: number, multiple: number): VolumeCheck {
        // hasVolume rules out null
        const volumes = history.candles
            .filter(candle => candle.hasVolume)
            .map(candle => candle.volume ?? 0);

        if (volumes.length === 0) {
            return { lastVolume: null, averageVolume: null, volumeRatio: null, volumeOk: false };
        }

        const lastVolume = volumes[volumes.length - 1];
        const averageVolume = this.indicators.trailingMean(volumes, window);

        let volumeRatio: number | null = null;
        if (averageVolume !== null && averageVolume > 0) {
            volumeRatio = lastVolume / averageVolume;
        } else if (averageVolume !== null && lastVolume > 0) {
            volumeRatio = Infinity;
        }

        return {
            lastVolume,
            averageVolume,
            volumeRatio,
            volumeOk: volumeRatio !== null && volumeRatio >= multiple
        };
    }
}
