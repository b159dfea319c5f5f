import { Candle } from '../../../domain/entities/Candle';
import { DataSourceError } from '../../../domain/errors/ScreenerErrors';

export const REQUIRED_COLUMNS = ['Open', 'High', 'Low', 'Close', 'Adj Close', 'Volume'] as const;

export type CsvRow = Record<string, string>;

export class CsvCandleMapper {
    /**
     * Yahoo export row to a candle. Rows whose close is blank or "null"
     * (exchange holidays in Yahoo exports) map to null.
     */
    static toDomain(row: CsvRow, dateColumn: string): Candle | null {
        const close = this.parseNumber(row['Close']);
        if (close === null) return null;

        const timestamp = Date.parse(row[dateColumn] ?? '');
        if (Number.isNaN(timestamp)) {
            throw new DataSourceError(`Invalid date '${row[dateColumn]}' in CSV`);
        }

        return new Candle(
            timestamp,
            this.parseNumber(row['Open']) ?? close,
            this.parseNumber(row['High']) ?? close,
            this.parseNumber(row['Low']) ?? close,
            close,
            this.parseNumber(row['Adj Close']) ?? close,
            this.parseNumber(row['Volume'])
        );
    }

    private static parseNumber(raw: string | undefined): number | null {
        if (raw === undefined || raw === '' || raw.toLowerCase() === 'null') return null;
        const value = Number(raw);
        return Number.isFinite(value) ? value : null;
    }
}
