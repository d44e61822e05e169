import { Controller, Get } from '@nestjs/common';
import type {
  DebugBarDataDto,
  DebugBarWidgetsDto,
} from '@query-profiler/contract';
import { QueryCollector } from './query-collector';

/**
 * Debug bar endpoints.
 * Serve the collected query snapshot and the widget metadata a UI needs to
 * render it.
 */
@Controller('debugbar')
export class DebugBarController {
  constructor(private readonly collector: QueryCollector) {}

  @Get()
  getData(): DebugBarDataDto {
    return {
      name: this.collector.getName(),
      data: this.collector.collect(),
    };
  }

  @Get('widgets')
  getWidgets(): DebugBarWidgetsDto {
    return {
      widgets: this.collector.getWidgets(),
      assets: this.collector.getAssets(),
    };
  }
}
