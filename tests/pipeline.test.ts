import { describe, expect, it, vi } from 'vitest';
import { Pipeline } from '../src/pipeline';
import { SourceTask, StaticListAdapter, sourceTask } from '../src/modules/adapters';
import { CompanySizeEstimator, Enricher } from '../src/modules/enrichers';
import { RulesEngine, isHighValueTarget } from '../src/modules/scorer';
import { createSilentLogger } from '../src/modules/observability';
import { BatchResult, Company, CompanySize, FundingStage, PipelineStage } from '../src/types';
import { createCompany, createEnrichment, createHiringIntent } from '../src/types/factories';
import { ConfigurationError } from '../src/utils/errors';
import {
  coldLead,
  delay,
  distinctCompanies,
  failingTask,
  fixedTask,
  hangingTask,
  hotLead,
} from './helpers';

const logger = createSilentLogger();

const throwingTask = (name: string, message: string): SourceTask => ({
  name,
  run: async () => {
    throw new Error(message);
  },
});

describe('Pipeline', () => {
  describe('collection', () => {
    it('isolates a crashing adapter from the others', async () => {
      const pipeline = new Pipeline({ logger, enableScoring: false });

      const result = await pipeline.run([
        throwingTask('broken', 'boom'),
        fixedTask('first', distinctCompanies(5)),
        fixedTask('second', distinctCompanies(7, 5)),
      ]);

      expect(result.cancelled).toBe(false);
      expect(result.companies).toHaveLength(12);
      expect(result.errors).toEqual(['broken: Unhandled error in broken: boom']);
      expect(result.stats).toMatchObject({ sources: 3, failedSources: 1, collected: 12, afterDeduplication: 12 });
    });

    it('reports a failed batch once, with its errors joined', async () => {
      const pipeline = new Pipeline({ logger });

      const result = await pipeline.run([
        failingTask('directory', 'HTTP 404'),
        fixedTask('list', distinctCompanies(2)),
      ]);

      expect(result.errors).toEqual(['directory: HTTP 404']);
      expect(result.companies).toHaveLength(2);
    });

    it('carries warnings from successful batches with the adapter name', async () => {
      const pipeline = new Pipeline({ logger });
      const adapter = new StaticListAdapter(logger, 'manual');

      const result = await pipeline.run([
        sourceTask(adapter, { records: [{ name: 'Acme' }, { homepage: 'no name here' }] }),
      ]);

      expect(result.companies.map(c => c.name)).toEqual(['Acme']);
      expect(result.warnings).toEqual(['manual: Skipped item 1: not a valid company record']);
      expect(result.errors).toEqual([]);
    });

    it('merges batches in completion order and keeps order within a batch', async () => {
      const pipeline = new Pipeline({ logger, enableDeduplication: false, enableScoring: false });
      const [acme, globex, initech] = distinctCompanies(3);

      const result = await pipeline.run([
        fixedTask('slow', [acme], 30),
        fixedTask('fast', [globex, initech]),
      ]);

      expect(result.companies.map(c => c.name)).toEqual(['Globex', 'Initech', 'Acme']);
    });

    it('runs at most maxWorkers adapters at once', async () => {
      let active = 0;
      let peak = 0;
      const tracked = (name: string): SourceTask => ({
        name,
        run: async () => {
          active++;
          peak = Math.max(peak, active);
          await delay(10);
          active--;
          return fixedTask(name, []).run();
        },
      });

      const pipeline = new Pipeline({ logger, maxWorkers: 2 });
      await pipeline.run(['a', 'b', 'c', 'd', 'e'].map(tracked));

      expect(peak).toBe(2);
    });

    it('returns an empty result when every adapter fails', async () => {
      const pipeline = new Pipeline({ logger });

      const result = await pipeline.run([failingTask('a', 'down'), failingTask('b', 'down')]);

      expect(result.companies).toEqual([]);
      expect(result.errors).toEqual(['a: down', 'b: down']);
      expect(result.cancelled).toBe(false);
      expect(result.skippedStages).toEqual([
        PipelineStage.DEDUPLICATING,
        PipelineStage.ENRICHING,
        PipelineStage.SCORING,
        PipelineStage.FILTERING,
      ]);
    });
  });

  describe('scoring and filtering', () => {
    const engaged = (name: string, enrichment: Parameters<typeof createEnrichment>[0], extra: Partial<Company> = {}) =>
      createCompany({ name, website: `https://${name.toLowerCase()}.example`, enrichment: createEnrichment(enrichment), ...extra });

    it('keeps only companies at or above the threshold, highest first', async () => {
      const pipeline = new Pipeline({ logger, enableDeduplication: false, minScoreThreshold: 50 });

      const companies = [
        coldLead('Cold'),
        // 52.5
        engaged('Middle', {
          companySize: CompanySize.MEDIUM,
          hiringIntent: createHiringIntent({ isHiring: true, totalOpenPositions: 6 }),
        }),
        // 39
        engaged('Corporate', {
          companySize: CompanySize.ENTERPRISE,
          fundingInfo: { stage: FundingStage.SERIES_B, investors: [] },
          hiringIntent: createHiringIntent({ isHiring: true }),
        }, { description: 'Large and funded' }),
        hotLead('Hot'),
        // 77
        engaged('Growing', {
          companySize: CompanySize.MEDIUM,
          employeeCount: 100,
          hiringIntent: createHiringIntent({ isHiring: true, totalOpenPositions: 6, recentPostings: 2, hiringVelocity: 4 }),
          socialProfiles: { linkedin: 'https://linkedin.example/growing', github: 'https://github.example/growing' },
        }, { description: 'Growing fast' }),
      ];

      const result = await pipeline.run([fixedTask('leads', companies)]);

      expect(result.companies.map(c => c.name)).toEqual(['Hot', 'Growing', 'Middle']);
      const totals = result.companies.map(c => c.score?.total ?? 0);
      expect(totals[0]).toBeCloseTo(80.5, 10);
      expect(totals[1]).toBeCloseTo(77, 10);
      expect(totals[2]).toBeCloseTo(52.5, 10);
      expect(result.stats).toMatchObject({ scored: 5, filteredOut: 2, returned: 3 });
    });

    it('does not filter unscored companies when scoring is disabled', async () => {
      const pipeline = new Pipeline({ logger, enableScoring: false, minScoreThreshold: 50 });

      const result = await pipeline.run([fixedTask('leads', [coldLead()])]);

      expect(result.companies).toHaveLength(1);
      expect(result.companies[0].score).toBeUndefined();
      expect(result.skippedStages).toContain(PipelineStage.SCORING);
      expect(result.skippedStages).toContain(PipelineStage.FILTERING);
    });

    it('exposes normalized weights', () => {
      const pipeline = new Pipeline({ logger, weights: { intent: 0.5, fit: 0.5, tech: 0.5, engagement: 0.5 } });
      expect(pipeline.weights).toEqual({ intent: 0.25, fit: 0.25, tech: 0.25, engagement: 0.25 });
    });
  });

  describe('enrichment', () => {
    it('runs enrichers in order and isolates failures per record', async () => {
      const calls: string[] = [];
      const flaky: Enricher = {
        name: 'flaky',
        enrichRecord: async (company) => {
          calls.push(`flaky:${company.name}`);
          if (company.name === 'Globex') throw new Error('lookup refused');
          return company;
        },
      };
      const tagger: Enricher = {
        name: 'tagger',
        enrichRecord: (company) => {
          calls.push(`tagger:${company.name}`);
          company.extraData.tagged = true;
          return company;
        },
      };

      const pipeline = new Pipeline({ logger, enableScoring: false, enrichers: [flaky, tagger] });
      const result = await pipeline.run([fixedTask('list', distinctCompanies(3))]);

      expect(calls).toEqual([
        'flaky:Acme', 'flaky:Globex', 'flaky:Initech',
        'tagger:Acme', 'tagger:Globex', 'tagger:Initech',
      ]);
      expect(result.warnings).toEqual(['flaky failed for Globex: lookup refused']);
      expect(result.errors).toEqual([]);
      expect(result.companies.every(c => c.extraData.tagged === true)).toBe(true);
      expect(result.stats.enrichmentFailures).toBe(1);
    });

    it('feeds enriched data into scoring', async () => {
      const pipeline = new Pipeline({ logger, enrichers: [new CompanySizeEstimator()] });
      const adapter = new StaticListAdapter(logger, 'manual');

      const result = await pipeline.run([
        sourceTask(adapter, { records: [{ name: 'Sized', website: 'https://sized.example', employee_count: 45 }] }),
      ]);

      const [company] = result.companies;
      expect(company.enrichment?.companySize).toBe(CompanySize.SMALL);
      expect(company.score).toMatchObject({ fit: 90, engagement: 30, priority: 'low' });
      expect(company.score?.total).toBeCloseTo(31.5, 10);
    });

    it('keeps the copy an enricher returns', async () => {
      const describer: Enricher = {
        name: 'describer',
        enrichRecord: (company) => ({ ...company, description: 'Added by enrichment' }),
      };
      const pipeline = new Pipeline({ logger, enrichers: [describer] });

      const result = await pipeline.run([fixedTask('list', distinctCompanies(1))]);

      expect(result.companies[0].description).toBe('Added by enrichment');
      expect(result.companies[0].score?.engagement).toBe(50);
    });

    it('records rule outcomes next to the score', async () => {
      const rules = new RulesEngine()
        .addRule('high_value_target', isHighValueTarget)
        .addRule('has_domain', (company) => company.domain !== undefined);
      const pipeline = new Pipeline({ logger, rules });

      const result = await pipeline.run([fixedTask('list', distinctCompanies(1))]);

      expect(result.companies[0].extraData.rules).toEqual({ high_value_target: false, has_domain: true });
    });

    it('turns a throwing rule into a warning', async () => {
      const rules = new RulesEngine().addRule('broken', () => {
        throw new Error('no data');
      });
      const pipeline = new Pipeline({ logger, rules });

      const result = await pipeline.run([fixedTask('list', distinctCompanies(1))]);

      expect(result.companies).toHaveLength(1);
      expect(result.warnings).toEqual(['rules failed for Acme: no data']);
    });

    it('skips the stage when disabled', async () => {
      const enrichRecord = vi.fn((company: Company) => company);
      const pipeline = new Pipeline({ logger, enableEnrichment: false, enrichers: [{ name: 'spy', enrichRecord }] });

      const result = await pipeline.run([fixedTask('list', distinctCompanies(1))]);

      expect(enrichRecord).not.toHaveBeenCalled();
      expect(result.skippedStages).toContain(PipelineStage.ENRICHING);
    });
  });

  describe('cancellation', () => {
    it('abandons in-flight adapters and returns no partial output', async () => {
      const controller = new AbortController();
      const pipeline = new Pipeline({ logger });
      setTimeout(() => controller.abort(), 20);

      const result = await pipeline.run([fixedTask('fast', distinctCompanies(2)), hangingTask('stuck')], controller.signal);

      expect(result.cancelled).toBe(true);
      expect(result.companies).toEqual([]);
      expect(pipeline.currentStage).toBe(PipelineStage.DONE);
    });

    it('does not start queued adapters after cancellation', async () => {
      const controller = new AbortController();
      const run = vi.fn(async (): Promise<BatchResult> => fixedTask('queued', []).run());
      const pipeline = new Pipeline({ logger, maxWorkers: 1 });
      setTimeout(() => controller.abort(), 20);

      const result = await pipeline.run([hangingTask('stuck'), { name: 'queued', run }], controller.signal);

      expect(result.cancelled).toBe(true);
      expect(run).not.toHaveBeenCalled();
    });

    it('starts nothing when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const run = vi.fn(async (): Promise<BatchResult> => fixedTask('never', []).run());

      const result = await new Pipeline({ logger }).run([{ name: 'never', run }], controller.signal);

      expect(result.cancelled).toBe(true);
      expect(run).not.toHaveBeenCalled();
    });
  });

  it('tags each run with its own id', async () => {
    const pipeline = new Pipeline({ logger });

    const first = await pipeline.run([]);
    const second = await pipeline.run([]);

    expect(first.runId).toMatch(/^run-[0-9a-f-]{36}$/);
    expect(second.runId).not.toBe(first.runId);
    expect(first.companies).toEqual([]);
  });

  it('rejects invalid options at construction', () => {
    expect(() => new Pipeline({ logger, maxWorkers: 0 })).toThrow(ConfigurationError);
    expect(() => new Pipeline({ logger, maxWorkers: 1.5 })).toThrow(ConfigurationError);
    expect(() => new Pipeline({ logger, minScoreThreshold: 150 })).toThrow(ConfigurationError);
    expect(() => new Pipeline({ logger, nameSimilarityThreshold: 2 })).toThrow(ConfigurationError);
    expect(() => new Pipeline({ logger, weights: { intent: -1, fit: 1, tech: 1, engagement: 1 } })).toThrow(ConfigurationError);
  });
});
