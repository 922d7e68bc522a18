import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { EvaluationController } from './evaluation.controller';
import { EvaluationService } from './evaluation.service';
import { ExtractedPlotData } from '../plot-data/interfaces/plot-data.interface';

type PlotPair = [readonly ExtractedPlotData[], readonly ExtractedPlotData[]];

describe('EvaluationController', () => {
  let controller: EvaluationController;
  let evaluationService: {
    getSettings: jest.Mock;
    evaluatePlots: jest.Mock<{ score: number }, PlotPair>;
    evaluatePoints: jest.Mock;
  };

  beforeEach(async () => {
    evaluationService = {
      getSettings: jest.fn().mockReturnValue({ seriesMatching: 'exact' }),
      evaluatePlots: jest.fn<{ score: number }, PlotPair>().mockReturnValue({ score: 0.75 }),
      evaluatePoints: jest.fn().mockReturnValue({ distance: 0.5 }),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [EvaluationController],
      providers: [
        {
          provide: EvaluationService,
          useValue: evaluationService,
        },
      ],
    }).compile();

    controller = module.get<EvaluationController>(EvaluationController);
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  it('should expose the active settings', () => {
    expect(controller.getConfig()).toEqual({ seriesMatching: 'exact' });
  });

  describe('evaluatePlots', () => {
    it('should build plot data from the body and delegate', () => {
      const result = controller.evaluatePlots({
        predicted: [{ metadata: { xAxisLabel: 'Epoch' }, dataSeries: [{ name: 'A', points: [{ x: 0, y: 1 }] }] }],
        reference: [{ metadata: {}, dataSeries: [] }],
      });

      expect(result).toEqual({ score: 0.75 });
      const [predicted, reference] = evaluationService.evaluatePlots.mock.calls[0];
      expect(predicted[0].metadata.xAxisLabel).toBe('Epoch');
      expect(predicted[0].dataSeries[0].points[0]).toEqual({ x: 0, y: 1, seriesName: 'A', axis: 'left' });
      expect(reference[0].dataSeries).toEqual([]);
    });

    it('should reject duplicate series names', () => {
      expect(() =>
        controller.evaluatePlots({
          predicted: [
            {
              metadata: {},
              dataSeries: [
                { name: 'A', points: [] },
                { name: 'A', points: [] },
              ],
            },
          ],
          reference: [],
        }),
      ).toThrow(BadRequestException);
      expect(evaluationService.evaluatePlots).not.toHaveBeenCalled();
    });
  });

  describe('evaluatePoints', () => {
    it('should pass coordinate maps and the error metric through', () => {
      const result = controller.evaluatePoints({
        predicted: { A: [[0, 0]] },
        reference: { A: [[0, 0], [1, 1]] },
        errorMetric: 'mae',
      });

      expect(result).toEqual({ distance: 0.5 });
      expect(evaluationService.evaluatePoints).toHaveBeenCalledWith(
        { A: [[0, 0]] },
        { A: [[0, 0], [1, 1]] },
        'mae',
      );
    });

    it('should list the problems with a malformed body', () => {
      try {
        controller.evaluatePoints({ predicted: {}, reference: 'nope' });
        throw new Error('expected BadRequestException');
      } catch (error) {
        expect(error).toBeInstanceOf(BadRequestException);
        if (error instanceof BadRequestException) {
          expect(error.getResponse()).toEqual({
            message: 'Invalid request body',
            issues: ['reference: Expected object, received string'],
          });
        }
      }
    });

    it('should reject coordinates that are not pairs', () => {
      expect(() => controller.evaluatePoints({ predicted: { A: [[0]] }, reference: { A: [] } })).toThrow(
        BadRequestException,
      );
    });
  });
});
