import path from 'path';
import { CsvDataSource, loadCsv } from '../../../src/infrastructure/datasources/csv/CsvDataSource';
import { CsvCandleMapper } from '../../../src/infrastructure/datasources/csv/CsvCandleMapper';
import { DataSourceError } from '../../../src/domain/errors/ScreenerErrors';

const FIXTURES = path.join(__dirname, '..', '..', 'fixtures');
const SETUP_CSV = path.join(FIXTURES, 'glb_setup.csv');

describe('loadCsv', () => {
    it('reads every session and skips null rows', () => {
        const history = loadCsv(SETUP_CSV);

        expect(history.length).toBe(281);
        expect(history.candles[0].timestamp).toBe(Date.parse('2021-01-04'));
        expect(history.asOf.toISOString()).toBe('2022-01-31T00:00:00.000Z');
        expect(history.closes()[history.length - 1]).toBe(61.2);
        expect(history.candles[history.length - 1].volume).toBe(2000);
    });

    it('lists missing columns', () => {
        expect(() => loadCsv(path.join(FIXTURES, 'missing_columns.csv')))
            .toThrow('CSV file is missing required columns: Adj Close, High, Low, Volume');
    });

    it('reports an unreadable file', () => {
        expect(() => loadCsv(path.join(FIXTURES, 'does_not_exist.csv'))).toThrow(DataSourceError);
    });
});

describe('CsvCandleMapper', () => {
    it('falls back to the close for missing prices', () => {
        const candle = CsvCandleMapper.toDomain(
            { Date: '2024-03-01', Open: '', High: 'null', Low: '9', Close: '10', 'Adj Close': '', Volume: '' },
            'Date'
        );

        expect(candle).not.toBeNull();
        expect(candle?.open).toBe(10);
        expect(candle?.high).toBe(10);
        expect(candle?.low).toBe(9);
        expect(candle?.adjClose).toBe(10);
        expect(candle?.volume).toBeNull();
    });

    it('drops rows without a close', () => {
        expect(CsvCandleMapper.toDomain({ Date: '2024-03-01', Close: 'null' }, 'Date')).toBeNull();
    });

    it('rejects an unparseable date', () => {
        expect(() => CsvCandleMapper.toDomain({ Date: 'yesterday', Close: '10' }, 'Date'))
            .toThrow("Invalid date 'yesterday' in CSV");
    });
});

describe('CsvDataSource', () => {
    it('serves the same history for any ticker', async () => {
        const source = new CsvDataSource(SETUP_CSV);

        const first = await source.getHistory('AAA');
        const second = await source.getHistory('BBB');

        expect(second).toBe(first);
    });

    it('rejects when the file cannot be loaded', async () => {
        await expect(new CsvDataSource(path.join(FIXTURES, 'missing_columns.csv')).getHistory('AAA'))
            .rejects.toThrow(DataSourceError);
    });
});
