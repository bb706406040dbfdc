import { Controller, Get } from '@nestjs/common';
import { ClassificationEngine } from './modules/screening/engine';
import { ScreeningService } from './modules/screening/screening.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly engine: ClassificationEngine,
    private readonly screeningService: ScreeningService,
  ) {}

  @Get()
  check() {
    const settings = this.screeningService.getSettings();

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      engine: {
        mode: settings.mode,
        protectionActive: settings.protectionActive,
        referenceLists: this.engine.getListSizes(),
      },
    };
  }
}
