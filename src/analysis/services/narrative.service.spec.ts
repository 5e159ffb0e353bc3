import { NarrativeCapability, NarrativeRequest } from '../../common/interfaces';
import { FULL_RESUME, loadTestConfig, profileFromText } from '../../../test/helpers';
import { AggregateScorerTool } from '../tools/aggregate-scorer.tool';
import { CategoryScorerTool } from '../tools/category-scorer.tool';
import { LLMService } from './llm.service';
import { NarrativeService } from './narrative.service';

const llmConfig = { llmModel: 'test-model', maxNewTokens: 200, timeoutMs: 1000 };

const buildRequest = (): NarrativeRequest => {
  const config = loadTestConfig();
  const profile = profileFromText(FULL_RESUME);
  const report = new AggregateScorerTool(config).aggregate(new CategoryScorerTool(config).score(profile));
  return { profile, report, weaknesses: [] };
};

const present = (generate: (request: NarrativeRequest) => Promise<string>): NarrativeCapability => ({
  kind: 'present',
  model: 'test-model',
  timeoutMs: 1000,
  generate,
});

describe('NarrativeService', () => {
  const service = new NarrativeService(new LLMService(llmConfig));
  const request = buildRequest();

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('createCapability', () => {
    it('is absent without an inference token', () => {
      expect(service.createCapability(5000)).toEqual({
        kind: 'absent',
        reason: 'AI narrative is not configured',
      });
    });

    it('is present with an inference token', () => {
      const configured = new NarrativeService(new LLMService({ ...llmConfig, hfToken: 'test-secret' }));
      const capability = configured.createCapability(5000);

      expect(capability.kind).toBe('present');
      expect(capability).toMatchObject({ model: 'test-model', timeoutMs: 5000 });
    });
  });

  describe('augment', () => {
    it('returns the generated text', async () => {
      const generate = jest.fn(async (_request: NarrativeRequest) => 'Strong backend profile.');

      await expect(service.augment(present(generate), request)).resolves.toEqual({
        status: 'available',
        text: 'Strong backend profile.',
        model: 'test-model',
      });
      expect(generate).toHaveBeenCalledWith(request);
    });

    it('reports an absent capability as unavailable', async () => {
      await expect(
        service.augment({ kind: 'absent', reason: 'AI narrative is not configured' }, request),
      ).resolves.toEqual({ status: 'unavailable', reason: 'AI narrative is not configured' });
    });

    it('reports generation errors as unavailable', async () => {
      const failing = present(async () => {
        throw new Error('quota exceeded');
      });

      await expect(service.augment(failing, request)).resolves.toEqual({
        status: 'unavailable',
        reason: 'generation failed: quota exceeded',
      });
    });

    it('gives up after the timeout', async () => {
      jest.useFakeTimers();
      const stalled = present(() => new Promise<string>(() => undefined));

      const pending = service.augment(stalled, request, 250);
      jest.advanceTimersByTime(250);

      await expect(pending).resolves.toEqual({
        status: 'unavailable',
        reason: 'timed out after 250ms',
      });
    });

    it('clears the timer once generation settles', async () => {
      jest.useFakeTimers();

      await service.augment(present(async () => 'Done.'), request);

      expect(jest.getTimerCount()).toBe(0);
    });
  });

  it('estimates prompt size from the built prompt', () => {
    const llm = new LLMService(llmConfig);
    const estimate = new NarrativeService(llm).estimateUsage(request);
    const promptCharacters = llm.buildNarrativePrompt(request).length;

    expect(estimate).toEqual({
      promptCharacters,
      estimatedTokens: Math.ceil(promptCharacters / 4),
    });
  });
});
