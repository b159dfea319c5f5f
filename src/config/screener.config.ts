/**
 * Screener defaults.
 *
 * Detector thresholds follow the glossary definitions; every value here can be
 * overridden per run from the CLI or through ScreeningParameters.
 */

export const ScreenerConfig = {
    // Passed through to the data source untouched
    history: {
        period: '2y',
        interval: '1d'
    },

    greenLine: {
        minBaseMonths: 3
    },

    darvasBox: {
        lookbackDays: 65,
        maxVolatility: 0.25,   // (high - low) / low
        breakoutBuffer: 0.02   // close must clear the box top by 2%
    },

    ribbon: {
        shortSpans: [3, 5, 8, 10, 12, 15],
        longSpans: [30, 35, 40, 45, 50, 60],
        warmupBars: 5
    },

    momentum: {
        fastPeriod: 12,
        slowPeriod: 26,
        signalPeriod: 9,
        slopeWindow: 10,
        slopeLookback: 2,
        minBars: 50
    },

    checklist: {
        volumeWindow: 50,
        breakoutVolumeMultiple: 1.5
    },

    yahoo: {
        baseUrl: 'https://query1.finance.yahoo.com/v8/finance/chart',
        userAgent: 'Mozilla/5.0 (compatible; glossary-screener/1.0)',
        retry: {
            maxAttempts: 3,
            baseDelayMs: 1000,
            maxDelayMs: 8000
        }
    }
} as const;

export type ScreenerConfigType = typeof ScreenerConfig;
