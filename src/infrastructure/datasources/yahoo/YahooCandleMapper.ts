import { Candle } from '../../../domain/entities/Candle';
import { YahooChartResult } from './types/YahooTypes';

export class YahooCandleMapper {
    /**
     * Columnar chart payload to candles. Bars without a close (halts, partial
     * sessions) are dropped; a missing volume stays null.
     */
    static toDomainArray(result: YahooChartResult): Candle[] {
        const timestamps = result.timestamp ?? [];
        const quote = result.indicators?.quote?.[0] ?? {};
        const adjClose = result.indicators?.adjclose?.[0]?.adjclose ?? [];

        const candles: Candle[] = [];
        timestamps.forEach((ts, i) => {
            const close = quote.close?.[i];
            if (close === null || close === undefined || !Number.isFinite(close)) return;

            candles.push(new Candle(
                ts * 1000,
                quote.open?.[i] ?? close,
                quote.high?.[i] ?? close,
                quote.low?.[i] ?? close,
                close,
                adjClose[i] ?? close,
                quote.volume?.[i] ?? null
            ));
        });

        return candles;
    }
}
