import { injectable } from 'inversify';
import { IDataSource, HistoryQuery } from '../../../domain/interfaces/IDataSource';
import { PriceHistory } from '../../../domain/entities/PriceHistory';
import { DataSourceError } from '../../../domain/errors/ScreenerErrors';
import { YahooCandleMapper } from './YahooCandleMapper';
import { YahooChartResponse } from './types/YahooTypes';
import { ScreenerConfig } from '../../../config/screener.config';
import { Logger } from '../../../shared/logger/Logger';
import { withRetry } from '../../../shared/utils/retry';

class RateLimitError extends DataSourceError {}

@injectable()
export class YahooChartDataSource implements IDataSource {
    private logger = Logger.getInstance();
    private readonly baseUrl = ScreenerConfig.yahoo.baseUrl;

    async getHistory(ticker: string, query: HistoryQuery = {}): Promise<PriceHistory> {
        const symbol = ticker.trim().toUpperCase();
        const url = `${this.baseUrl}/${encodeURIComponent(symbol)}?${this.buildParams(query)}`;
        this.logger.debug(`[Yahoo] GET ${url}`);

        const json = await withRetry(
            () => this.fetchChart(url),
            `chart/${symbol}`,
            ScreenerConfig.yahoo.retry,
            error => error instanceof RateLimitError
        );

        if (json.chart?.error) {
            throw new DataSourceError(`Yahoo chart error for ${symbol}: ${json.chart.error.description}`);
        }

        const result = json.chart?.result?.[0];
        const candles = result ? YahooCandleMapper.toDomainArray(result) : [];
        if (candles.length === 0) {
            throw new DataSourceError(`No price history returned for ${symbol}`);
        }

        this.logger.debug(`[Yahoo] ${symbol}: ${candles.length} bars`);
        return new PriceHistory(candles);
    }

    private buildParams(query: HistoryQuery): URLSearchParams {
        const params = new URLSearchParams({
            interval: query.interval ?? ScreenerConfig.history.interval,
            includeAdjustedClose: 'true'
        });

        if (query.start) {
            const end = query.end ?? new Date();
            params.append('period1', Math.floor(query.start.getTime() / 1000).toString());
            params.append('period2', Math.floor(end.getTime() / 1000).toString());
        } else {
            params.append('range', query.period ?? ScreenerConfig.history.period);
        }

        return params;
    }

    private async fetchChart(url: string): Promise<YahooChartResponse> {
        const response = await fetch(url, {
            headers: { 'User-Agent': ScreenerConfig.yahoo.userAgent }
        });

        if (response.status === 429) {
            throw new RateLimitError(`Yahoo rate limit: ${response.status}`);
        }
        // Yahoo reports unknown symbols as 404 with an error payload
        if (!response.ok && response.status !== 404) {
            throw new DataSourceError(`Yahoo chart request failed: ${response.status}`);
        }

        return await response.json() as YahooChartResponse;
    }
}
