import { IDataSource } from '../../domain/interfaces/IDataSource';
import { PriceHistory } from '../../domain/entities/PriceHistory';

/**
 * Fixed in-memory history, returned for any ticker.
 */
export class StaticDataSource implements IDataSource {
    constructor(private readonly history: PriceHistory) {}

    async getHistory(): Promise<PriceHistory> {
        return this.history;
    }
}
