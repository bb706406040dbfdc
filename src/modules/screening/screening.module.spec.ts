import { Test } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { ScreeningModule } from './screening.module';
import { AnalysisMode, BlockReason, ClassificationEngine } from './engine';

async function engineWith(screening: Record<string, unknown>) {
  const moduleRef = await Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, load: [() => ({ screening })] }),
      ScreeningModule,
    ],
  }).compile();

  return moduleRef.get(ClassificationEngine);
}

describe('ScreeningModule', () => {
  it('builds the engine from configured list overrides', async () => {
    const engine = await engineWith({ knownSpam: ['+74957775533'], highRisk: null });

    expect(engine.getListSizes()).toEqual({ knownSpam: 1, highRisk: 3 });
    expect(engine.classify('+74957775533', AnalysisMode.SMART)).toEqual({
      blocked: true,
      reason: BlockReason.KNOWN_SPAM,
    });
    expect(engine.classify('+79031112233', AnalysisMode.SMART)).toEqual({
      blocked: false,
      reason: null,
    });
    expect(engine.classify('+712345', AnalysisMode.PERMISSIVE)).toEqual({
      blocked: true,
      reason: BlockReason.KNOWN_SPAM,
    });
  });

  it('replaces the high-risk list', async () => {
    const engine = await engineWith({ knownSpam: null, highRisk: ['+78002000600'] });

    expect(engine.getListSizes()).toEqual({ knownSpam: 10, highRisk: 1 });
    expect(engine.classify('+78002000600', AnalysisMode.PERMISSIVE)).toEqual({
      blocked: true,
      reason: BlockReason.KNOWN_SPAM,
    });
    expect(engine.classify('+712345', AnalysisMode.PERMISSIVE)).toEqual({
      blocked: false,
      reason: null,
    });
  });
});
