import { injectable, inject } from 'inversify';
import { IDataSource } from '../../domain/interfaces/IDataSource';
import { ScreeningParameters } from '../../domain/types/IndicatorTypes';
import { ScreeningResult } from '../../domain/value-objects/ScreeningResult';
import { IndicatorReportBuilder } from '../services/reporting/IndicatorReportBuilder';
import { Logger } from '../../shared/logger/Logger';
import { TYPES } from '../../config/types';
import { ScreenerConfig } from '../../config/screener.config';

export interface ScreeningRequest {
    start?: Date;
    end?: Date;
    period?: string;
    interval?: string;
    parameters?: ScreeningParameters;
}

@injectable()
export class RunScreening {
    private logger = Logger.getInstance();

    constructor(
        @inject(TYPES.IDataSource) private readonly dataSource: IDataSource,
        @inject(TYPES.IndicatorReportBuilder) private readonly reportBuilder: IndicatorReportBuilder
    ) {}

    async execute(ticker: string, request: ScreeningRequest = {}): Promise<ScreeningResult> {
        const period = request.period ?? ScreenerConfig.history.period;
        const interval = request.interval ?? ScreenerConfig.history.interval;

        const history = await this.dataSource.getHistory(ticker, {
            start: request.start,
            end: request.end,
            period,
            interval
        });
        this.logger.debug(`${ticker}: loaded ${history.length} bars up to ${history.asOf.toISOString()}`);

        const indicators = this.reportBuilder.build(history, request.parameters);
        const passed = indicators.filter(r => r.passed).length;
        this.logger.info(`${ticker}: ${passed}/${indicators.length} indicators passed`);

        return new ScreeningResult(ticker, history.asOf, indicators);
    }
}
