export class ScreenerError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Raised when a series is shorter than an indicator needs.
 * Never degraded into a partial result.
 */
export class InsufficientDataError extends ScreenerError {
    constructor(
        public readonly indicator: string,
        public readonly required: number,
        public readonly actual: number
    ) {
        super(`${indicator} requires at least ${required} observations (got ${actual})`);
    }
}

export class InvalidParameterError extends ScreenerError {
    constructor(
        public readonly parameter: string,
        message: string
    ) {
        super(message);
    }
}

export class DataSourceError extends ScreenerError {}
