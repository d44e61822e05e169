import { Test, TestingModule } from '@nestjs/testing';
import { DebugBarController } from './debugbar.controller';
import { QueryCollector } from './query-collector';

describe('DebugBarController', () => {
  let controller: DebugBarController;
  let collector: QueryCollector;

  beforeEach(async () => {
    collector = new QueryCollector({ captureStack: () => [] });

    const module: TestingModule = await Test.createTestingModule({
      controllers: [DebugBarController],
      providers: [{ provide: QueryCollector, useValue: collector }],
    }).compile();

    controller = module.get<DebugBarController>(DebugBarController);
  });

  describe('getData', () => {
    it('returns the collector name and snapshot', () => {
      collector.log(
        'DebugPDOStatement::execute | 0.0020 sec | 2.00 KB | SELECT 1',
      );

      expect(controller.getData()).toEqual({
        name: 'queries',
        data: {
          nb_statements: 1,
          nb_failed_statements: 0,
          accumulated_duration: 0.002,
          accumulated_duration_str: '0.002s',
          peak_memory_usage: 2048,
          peak_memory_usage_str: '2 KB',
          statements: [
            {
              sql: 'SELECT 1',
              is_success: true,
              duration: 0.002,
              duration_str: '0.002s',
              memory: 2048,
              memory_str: '2 KB',
              caller: null,
              caller_str: null,
            },
          ],
        },
      });
    });
  });

  describe('getWidgets', () => {
    it('returns widget and asset metadata', () => {
      const result = controller.getWidgets();

      expect(Object.keys(result.widgets)).toEqual(['queries', 'queries:badge']);
      expect(result.assets.js).toBe('widgets/sqlqueries/widget.js');
    });
  });
});
