import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { createExtractedPlotData } from '../plot-data/plot-data.factory';
import { EvaluationService } from './evaluation.service';
import { CoordinateMap } from './metrics/point-distance.metric';

async function createService(env: Record<string, string> = {}): Promise<EvaluationService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      EvaluationService,
      {
        provide: ConfigService,
        useValue: {
          get: jest.fn((key: string) => env[key]),
        },
      },
    ],
  }).compile();

  return module.get<EvaluationService>(EvaluationService);
}

describe('EvaluationService', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  const reference = createExtractedPlotData({
    metadata: { xAxisLabel: 'Epoch', leftYAxisLabel: 'Loss' },
    dataSeries: [
      {
        name: 'Train Loss',
        points: [
          { x: 0, y: 0 },
          { x: 10, y: 10 },
        ],
      },
    ],
  });
  const renamed = createExtractedPlotData({
    metadata: { xAxisLabel: 'Epoch', leftYAxisLabel: 'Loss' },
    dataSeries: [
      {
        name: 'train loss',
        points: [
          { x: 0, y: 0 },
          { x: 10, y: 10 },
        ],
      },
    ],
  });

  beforeEach(() => {
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation();
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should be defined with default settings', async () => {
    const service = await createService();

    expect(service).toBeDefined();
    expect(service.getSettings().seriesMatching).toBe('exact');
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should warn when the weights do not sum to 1', async () => {
    await createService({ PLOT_METRIC_WEIGHTS: '1,1,1' });

    expect(warnSpy).toHaveBeenCalledWith(
      'Plot metric weights do not sum to 1.0 ({"metadata":1,"series":1,"numerical":1}); scores may leave [0, 1]',
    );
  });

  it('should fail fast on invalid configuration', async () => {
    await expect(createService({ POINT_METRIC_ERROR: 'median' })).rejects.toThrow(
      'Invalid evaluation configuration: POINT_METRIC_ERROR:',
    );
  });

  describe('evaluatePlots', () => {
    it('should use exact matching by default', async () => {
      const service = await createService();
      const evaluation = service.evaluatePlots([renamed], [reference]);

      // labels agree, no series paired
      expect(evaluation.score).toBeCloseTo(0.2, 10);
      expect(logSpy).toHaveBeenCalledWith('Scored 1 subplot(s): 0.2000');
    });

    it('should switch to fuzzy matching from configuration', async () => {
      const service = await createService({ SERIES_MATCHING: 'fuzzy' });

      expect(service.evaluatePlots([renamed], [reference]).score).toBeCloseTo(1, 10);
    });

    it('should warn and return 0 for empty input', async () => {
      const service = await createService();
      const evaluation = service.evaluatePlots([], [reference]);

      expect(evaluation.score).toBe(0);
      expect(warnSpy).toHaveBeenCalledWith('Plot evaluation not possible: no predicted subplots');
    });
  });

  describe('evaluatePoints', () => {
    const long: CoordinateMap = {
      A: [
        [0, 0],
        [10, 10],
      ],
    };
    const short: CoordinateMap = {
      A: [
        [0, 0],
        [5, 5],
      ],
    };

    it('should use the configured error metric', async () => {
      const service = await createService({ POINT_METRIC_ERROR: 'mae' });

      expect(service.evaluatePoints(short, long).distance).toBeCloseTo(Math.sqrt(0.5) / 2, 12);
    });

    it('should let the caller override the error metric', async () => {
      const service = await createService({ POINT_METRIC_ERROR: 'mae' });

      expect(service.evaluatePoints(short, long, 'rmse').distance).toBeCloseTo(0.5, 12);
    });

    it('should log missing series', async () => {
      const service = await createService();
      service.evaluatePoints(long, { ...long, B: [[1, 1]] });

      expect(logSpy).toHaveBeenCalledWith('Series missing in prediction: B');
    });

    it('should warn when nothing can be compared', async () => {
      const service = await createService();
      const evaluation = service.evaluatePoints({ A: [[0, 0]] }, { B: [[0, 0]] });

      expect(evaluation.distance).toBeNull();
      expect(warnSpy).toHaveBeenCalledWith('Point evaluation not possible: no series in common');
    });
  });
});
