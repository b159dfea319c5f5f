import 'reflect-metadata';
import { Container } from 'inversify';
import { TYPES } from './types';

// Interfaces
import { IDataSource } from '../domain/interfaces/IDataSource';
import { IIndicators } from '../domain/interfaces/IIndicators';
import { IResampler } from '../domain/interfaces/IResampler';
import { IGreenLineDetector } from '../domain/interfaces/IGreenLineDetector';
import { IDarvasBoxDetector } from '../domain/interfaces/IDarvasBoxDetector';
import { IChecklistStrategy } from '../domain/interfaces/IChecklistStrategy';

// Implementations
import { IndicatorsProvider } from '../application/services/indicators/IndicatorsProvider';
import { Resampler } from '../application/services/indicators/Resampler';
import { GreenLineDetector } from '../application/services/detection/GreenLineDetector';
import { DarvasBoxDetector } from '../application/services/detection/DarvasBoxDetector';
import { RibbonStackDetector } from '../application/services/detection/RibbonStackDetector';
import { MomentumDetector } from '../application/services/detection/MomentumDetector';
import { GlbChecklistStrategy } from '../application/strategies/GlbChecklistStrategy';
import { IndicatorReportBuilder } from '../application/services/reporting/IndicatorReportBuilder';
import { RunScreening } from '../application/use-cases/RunScreening';
import { YahooChartDataSource } from '../infrastructure/datasources/yahoo/YahooChartDataSource';
import { CsvDataSource } from '../infrastructure/datasources/csv/CsvDataSource';

export { TYPES };

export interface ContainerOptions {
    // Takes precedence over csvPath
    dataSource?: IDataSource;
    csvPath?: string;
}

export function createContainer(options: ContainerOptions = {}): Container {
    const container = new Container();

    // --- Indicator primitives (stateless) ---
    container.bind<IIndicators>(TYPES.IIndicators).to(IndicatorsProvider).inSingletonScope();
    container.bind<IResampler>(TYPES.IResampler).to(Resampler).inSingletonScope();

    // --- Detectors ---
    container.bind<IGreenLineDetector>(TYPES.IGreenLineDetector).to(GreenLineDetector);
    container.bind<IDarvasBoxDetector>(TYPES.IDarvasBoxDetector).to(DarvasBoxDetector);
    container.bind<RibbonStackDetector>(TYPES.RibbonStackDetector).to(RibbonStackDetector);
    container.bind<MomentumDetector>(TYPES.MomentumDetector).to(MomentumDetector);
    container.bind<IChecklistStrategy>(TYPES.IChecklistStrategy).to(GlbChecklistStrategy);

    // --- Reporting & use case ---
    container.bind<IndicatorReportBuilder>(TYPES.IndicatorReportBuilder).to(IndicatorReportBuilder);
    container.bind<RunScreening>(TYPES.RunScreening).to(RunScreening);

    // --- Data source: injected > CSV file > Yahoo ---
    if (options.dataSource) {
        container.bind<IDataSource>(TYPES.IDataSource).toConstantValue(options.dataSource);
    } else if (options.csvPath) {
        container.bind<IDataSource>(TYPES.IDataSource).toConstantValue(new CsvDataSource(options.csvPath));
    } else {
        container.bind<IDataSource>(TYPES.IDataSource).to(YahooChartDataSource).inSingletonScope();
    }

    return container;
}
