export interface YahooQuoteIndicators {
    open?: (number | null)[];
    high?: (number | null)[];
    low?: (number | null)[];
    close?: (number | null)[];
    volume?: (number | null)[];
}

export interface YahooChartResult {
    meta?: {
        symbol?: string;
        currency?: string;
        exchangeTimezoneName?: string;
    };
    // Seconds since epoch
    timestamp?: number[];
    indicators?: {
        quote?: YahooQuoteIndicators[];
        adjclose?: Array<{
            adjclose?: (number | null)[];
        }>;
    };
}

export interface YahooChartResponse {
    chart?: {
        result?: YahooChartResult[] | null;
        error?: {
            code: string;
            description: string;
        } | null;
    };
}
