// src/config/types.ts
export const TYPES = {
    IDataSource: Symbol.for('IDataSource'),
    IIndicators: Symbol.for('IIndicators'),
    IResampler: Symbol.for('IResampler'),
    IGreenLineDetector: Symbol.for('IGreenLineDetector'),
    IDarvasBoxDetector: Symbol.for('IDarvasBoxDetector'),
    RibbonStackDetector: Symbol.for('RibbonStackDetector'),
    MomentumDetector: Symbol.for('MomentumDetector'),
    IChecklistStrategy: Symbol.for('IChecklistStrategy'),
    IndicatorReportBuilder: Symbol.for('IndicatorReportBuilder'),
    RunScreening: Symbol.for('RunScreening')
};
