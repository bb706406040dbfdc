import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ScreeningController } from './screening.controller';
import { ScreeningService } from './screening.service';
import { REFERENCE_LISTS } from './screening.constants';
import {
  ClassificationEngine,
  DEFAULT_HIGH_RISK,
  DEFAULT_KNOWN_SPAM,
  type ReferenceLists,
} from './engine';

@Module({
  controllers: [ScreeningController],
  providers: [
    {
      provide: REFERENCE_LISTS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): ReferenceLists => ({
        knownSpam: config.get<string[] | null>('screening.knownSpam') ?? DEFAULT_KNOWN_SPAM,
        highRisk: config.get<string[] | null>('screening.highRisk') ?? DEFAULT_HIGH_RISK,
      }),
    },
    {
      provide: ClassificationEngine,
      inject: [REFERENCE_LISTS],
      useFactory: (lists: ReferenceLists) => new ClassificationEngine(lists),
    },
    ScreeningService,
  ],
  exports: [ScreeningService, ClassificationEngine],
})
export class ScreeningModule {}
