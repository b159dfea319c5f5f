import { Container } from 'inversify';
import { createContainer, TYPES } from '../../../../src/config/inversify.config';
import { IndicatorReportBuilder, INDICATOR_NAMES } from '../../../../src/application/services/reporting/IndicatorReportBuilder';
import { GreenLineDetector } from '../../../../src/application/services/detection/GreenLineDetector';
import { RibbonStackDetector } from '../../../../src/application/services/detection/RibbonStackDetector';
import { MomentumDetector } from '../../../../src/application/services/detection/MomentumDetector';
import { StaticDataSource } from '../../../../src/infrastructure/datasources/StaticDataSource';
import { InsufficientDataError } from '../../../../src/domain/errors/ScreenerErrors';
import { buildHistory, glbSetupHistory, linear } from '../../../helpers/buildHistory';

describe('IndicatorReportBuilder', () => {
    let container: Container;
    let builder: IndicatorReportBuilder;

    beforeEach(() => {
        container = createContainer({ dataSource: new StaticDataSource(glbSetupHistory()) });
        builder = container.get<IndicatorReportBuilder>(TYPES.IndicatorReportBuilder);
    });

    it('reports every indicator in a fixed order', () => {
        const report = builder.build(glbSetupHistory());

        expect(report.map(r => r.name)).toEqual([
            'Green Line Breakout',
            'Darvas Box Breakout',
            'RWB Pattern',
            'Momentum Daily',
            'Momentum Weekly',
            'GLB Checklist'
        ]);
        expect(report.every(r => r.passed)).toBe(true);
    });

    it('carries the detector metrics in the details', () => {
        const report = builder.build(glbSetupHistory());
        const [greenLine, darvas, , , , checklist] = report;

        expect(Object.keys(greenLine.details)).toEqual(['priorHigh', 'lastClose', 'monthsSincePriorHigh', 'baseMonths']);
        expect(greenLine.details.priorHigh).toBe(59.5);
        expect(darvas.details.boxHigh).toBe(45);
        expect(darvas.details.boxLow).toBe(45);
        expect(checklist.details.volumeRatio).toBe(2000 / 1020);
        expect(checklist.details.volumeRequirement).toBe(1.5);
    });

    it('passes screening parameters to the detectors', () => {
        const report = builder.build(glbSetupHistory(1200), { checklist: { breakoutVolumeMultiple: 2 } });
        const checklist = report.find(r => r.name === INDICATOR_NAMES.checklist);

        expect(checklist?.passed).toBe(false);
        expect(checklist?.details.volumeRequirement).toBe(2);
    });

    it('runs each detector once and feeds its outcome to the checklist', () => {
        const greenLineSpy = jest.spyOn(GreenLineDetector.prototype, 'detect');
        const ribbonSpy = jest.spyOn(RibbonStackDetector.prototype, 'detect');
        const momentumSpy = jest.spyOn(MomentumDetector.prototype, 'detect');

        try {
            const report = builder.build(glbSetupHistory(1200));
            const checklist = report[5];

            expect(greenLineSpy).toHaveBeenCalledTimes(1);
            expect(ribbonSpy).toHaveBeenCalledTimes(1);
            expect(momentumSpy).toHaveBeenCalledTimes(2);

            expect(checklist.details.greenLine).toBe(report[0].passed);
            expect(checklist.details.rwb).toBe(report[2].passed);
            expect(checklist.details.momentumDaily).toBe(report[3].passed);
            expect(checklist.details.momentumWeekly).toBe(report[4].passed);
        } finally {
            jest.restoreAllMocks();
        }
    });

    it('gives the same report for the same history', () => {
        const history = glbSetupHistory();
        expect(builder.build(history)).toEqual(builder.build(history));
    });

    it('propagates insufficient data', () => {
        expect(() => builder.build(buildHistory(linear(40, 10, 0.1)))).toThrow(InsufficientDataError);
    });
});
