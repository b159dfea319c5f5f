import { PriceHistory } from '../entities/PriceHistory';

export interface HistoryQuery {
    start?: Date;
    end?: Date;
    // Opaque to the engine, e.g. '2y' and '1d'
    period?: string;
    interval?: string;
}

export interface IDataSource {
    getHistory(ticker: string, query?: HistoryQuery): Promise<PriceHistory>;
}
