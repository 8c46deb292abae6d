import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PipelineConfigService } from '@app/config';
import { createTestingModule } from './testing-module.util';

@Injectable()
class TestService {
  constructor(private readonly pipelineConfig: PipelineConfigService) {}

  getMinLength(): number {
    return this.pipelineConfig.get().cleaning.minLength;
  }
}

describe('createTestingModule', () => {
  it('should create a test module builder', () => {
    const builder = createTestingModule({ providers: [TestService] });

    expect(typeof builder.compile).toBe('function');
  });

  it('should return compiled module and mocks with compile: true', async () => {
    const result = await createTestingModule({
      providers: [TestService],
      compile: true,
    });

    expect(result.mocks.configService.get).toBeDefined();
    expect(result.mocks.pipelineConfig.get).toBeDefined();

    await result.module.close();
  });

  it('should provide the default pipeline configuration', async () => {
    const { module } = await createTestingModule({
      providers: [TestService],
      compile: true,
    });

    expect(module.get(TestService).getMinLength()).toBe(20);

    await module.close();
  });

  it('should apply pipeline config overrides', async () => {
    const { module } = await createTestingModule({
      providers: [TestService],
      pipelineConfig: { cleaning: { minLength: 5 } },
      compile: true,
    });

    expect(module.get(TestService).getMinLength()).toBe(5);

    await module.close();
  });

  it('should return config overrides from the ConfigService mock', async () => {
    const { module } = await createTestingModule({
      providers: [TestService],
      configOverrides: { TOP_K: '7' },
      compile: true,
    });

    const configService = module.get<ConfigService>(ConfigService);
    expect(configService.get('TOP_K')).toBe('7');
    expect(configService.get('MISSING', 'fallback')).toBe('fallback');

    await module.close();
  });
});
