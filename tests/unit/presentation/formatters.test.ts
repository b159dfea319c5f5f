import { formatDetails, renderResultTable } from '../../../src/presentation/formatters/ResultTableRenderer';
import { serialiseResult, serialiseResults } from '../../../src/presentation/formatters/ResultJsonSerializer';
import { IndicatorResult } from '../../../src/domain/value-objects/IndicatorResult';
import { ScreeningResult } from '../../../src/domain/value-objects/ScreeningResult';

function sampleResult(): ScreeningResult {
    return new ScreeningResult('ACME', new Date('2024-05-31T00:00:00Z'), [
        new IndicatorResult('Green Line Breakout', true, { priorHigh: 30, lastClose: 31.456, baseMonths: 4 }),
        new IndicatorResult('GLB Checklist', false, { volumeRatio: Infinity, averageVolume: null, volumeOk: false })
    ]);
}

describe('formatDetails', () => {
    it('prints integers as-is and other numbers to two decimals', () => {
        expect(formatDetails({ priorHigh: 30, lastClose: 31.456 })).toBe('priorHigh=30, lastClose=31.46');
    });

    it('prints missing metrics as n/a and flags as booleans', () => {
        expect(formatDetails({ averageVolume: null, volumeOk: false })).toBe('averageVolume=n/a, volumeOk=false');
    });

    it('prints an empty string without details', () => {
        expect(formatDetails({})).toBe('');
    });
});

describe('renderResultTable', () => {
    it('renders one row per indicator', () => {
        const table = renderResultTable([sampleResult()]);

        expect(table).toContain('Green Line Breakout');
        expect(table).toContain('GLB Checklist');
        expect(table).toContain('PASS');
        expect(table).toContain('FAIL');
        expect(table).toContain('2024-05-31');
    });
});

describe('serialiseResult', () => {
    it('writes the ticker, ISO date and indicators', () => {
        expect(serialiseResult(sampleResult())).toEqual({
            ticker: 'ACME',
            as_of: '2024-05-31T00:00:00.000Z',
            indicators: [
                {
                    name: 'Green Line Breakout',
                    passed: true,
                    details: { priorHigh: 30, lastClose: 31.456, baseMonths: 4 }
                },
                {
                    name: 'GLB Checklist',
                    passed: false,
                    details: { volumeRatio: 'Infinity', averageVolume: null, volumeOk: false }
                }
            ]
        });
    });

    it('produces parseable JSON', () => {
        const parsed: unknown = JSON.parse(serialiseResults([sampleResult()]));
        expect(Array.isArray(parsed)).toBe(true);
    });
});
