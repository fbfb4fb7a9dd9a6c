import crypto from 'crypto';
import pLimit from 'p-limit';
import { Config } from '../config';
import { BatchResult, Company, DataSource, PipelineResult, PipelineStage, ScoreWeights } from '../types';
import { addError, createBatchResult } from '../types/factories';
import { SourceTask } from '../modules/adapters';
import { CompanyDeduper, DEFAULT_NAME_SIMILARITY } from '../modules/deduper';
import { Enricher } from '../modules/enrichers';
import { LeadScorer, DEFAULT_WEIGHTS, RulesEngine } from '../modules/scorer';
import { Logger, RunMetrics } from '../modules/observability';
import { AdapterFailure, ConfigurationError, errorMessage } from '../utils/errors';

export interface PipelineOptions {
    logger: Logger;
    maxWorkers?: number;
    enableDeduplication?: boolean;
    enableEnrichment?: boolean;
    enableScoring?: boolean;
    minScoreThreshold?: number;
    nameSimilarityThreshold?: number;
    weights?: ScoreWeights;
    enrichers?: Enricher[];
    /** Evaluated on every scored company; outcomes land in extraData.rules. */
    rules?: RulesEngine;
}

type RunState = {
    runId: string;
    errors: string[];
    warnings: string[];
    skipped: PipelineStage[];
    metrics: RunMetrics;
};

/** Resolves with null once the signal fires; dispose() detaches the listener. */
const whenAborted = (signal: AbortSignal) => {
    let dispose = () => { };
    const promise = new Promise<null>((resolve) => {
        if (signal.aborted) return resolve(null);
        const onAbort = () => resolve(null);
        signal.addEventListener('abort', onAbort, { once: true });
        dispose = () => signal.removeEventListener('abort', onAbort);
    });
    return { promise, dispose };
};

/**
 * Collect -> deduplicate -> enrich -> score -> filter.
 *
 * Only collection runs in parallel (bounded by maxWorkers). Later stages need
 * the whole list and run sequentially. No single source, enricher or record
 * failure aborts a run; those end up in the result's errors and warnings.
 */
export class Pipeline {
    readonly maxWorkers: number;
    readonly enableDeduplication: boolean;
    readonly enableEnrichment: boolean;
    readonly enableScoring: boolean;
    readonly minScoreThreshold: number;

    private logger: Logger;
    private deduper: CompanyDeduper;
    private scorer: LeadScorer;
    private enrichers: Enricher[];
    private rules?: RulesEngine;
    private stage = PipelineStage.IDLE;

    constructor(options: PipelineOptions) {
        this.maxWorkers = options.maxWorkers ?? 3;
        this.enableDeduplication = options.enableDeduplication ?? true;
        this.enableEnrichment = options.enableEnrichment ?? true;
        this.enableScoring = options.enableScoring ?? true;
        this.minScoreThreshold = options.minScoreThreshold ?? 0;

        if (!Number.isInteger(this.maxWorkers) || this.maxWorkers < 1) {
            throw new ConfigurationError(`maxWorkers must be a positive integer (got ${this.maxWorkers})`);
        }
        if (!Number.isFinite(this.minScoreThreshold) || this.minScoreThreshold < 0 || this.minScoreThreshold > 100) {
            throw new ConfigurationError(`minScoreThreshold must be within [0, 100] (got ${this.minScoreThreshold})`);
        }

        this.logger = options.logger.child({ component: 'pipeline' });
        this.deduper = new CompanyDeduper(options.logger.child({ component: 'deduper' }), options.nameSimilarityThreshold ?? DEFAULT_NAME_SIMILARITY);
        this.scorer = new LeadScorer(options.logger.child({ component: 'scorer' }), options.weights ?? DEFAULT_WEIGHTS);
        this.enrichers = options.enrichers ?? [];
        this.rules = options.rules;

        this.logger.info(`Initialized Pipeline (enrichment=${this.enableEnrichment}, scoring=${this.enableScoring}, dedup=${this.enableDeduplication}, workers=${this.maxWorkers})`);
    }

    static fromConfig(config: Config, logger: Logger, enrichers: Enricher[] = [], rules?: RulesEngine): Pipeline {
        return new Pipeline({
            logger,
            enrichers,
            rules,
            maxWorkers: config.pipeline.max_workers,
            enableDeduplication: config.pipeline.enable_deduplication,
            enableEnrichment: config.pipeline.enable_enrichment,
            enableScoring: config.pipeline.enable_scoring,
            minScoreThreshold: config.pipeline.min_score_threshold,
            nameSimilarityThreshold: config.deduplication.name_similarity_threshold,
            weights: config.scoring.weights,
        });
    }

    get currentStage(): PipelineStage {
        return this.stage;
    }

    get weights(): ScoreWeights {
        return this.scorer.weights;
    }

    async run(sources: SourceTask[], signal?: AbortSignal): Promise<PipelineResult> {
        const state: RunState = {
            runId: `run-${crypto.randomUUID()}`,
            errors: [],
            warnings: [],
            skipped: [],
            metrics: new RunMetrics(),
        };
        this.logger.info(`Pipeline run started: ${state.runId} (${sources.length} sources)`);

        this.stage = PipelineStage.COLLECTING;
        let companies = await this.collect(sources, state, signal);
        if (signal?.aborted) return this.cancel(state);
        this.logger.info(`Collected ${companies.length} companies from ${sources.length} sources`);

        if (companies.length === 0) {
            this.logger.warn('No companies collected. Skipping remaining stages.');
        }

        this.stage = PipelineStage.DEDUPLICATING;
        if (this.enableDeduplication && companies.length > 0) {
            companies = this.deduper.dedupe(companies);
        } else {
            state.skipped.push(PipelineStage.DEDUPLICATING);
        }
        state.metrics.stats.afterDeduplication = companies.length;
        if (signal?.aborted) return this.cancel(state);

        this.stage = PipelineStage.ENRICHING;
        if (this.enableEnrichment && this.enrichers.length > 0 && companies.length > 0) {
            const completed = await this.enrich(companies, state, signal);
            if (!completed) return this.cancel(state);
        } else {
            state.skipped.push(PipelineStage.ENRICHING);
        }
        if (signal?.aborted) return this.cancel(state);

        this.stage = PipelineStage.SCORING;
        if (this.enableScoring && companies.length > 0) {
            companies = this.scorer.scoreAll(companies);
            state.metrics.stats.scored = companies.length;
            if (this.rules && this.rules.size > 0) this.applyRules(this.rules, companies, state);
        } else {
            state.skipped.push(PipelineStage.SCORING);
        }
        if (signal?.aborted) return this.cancel(state);

        this.stage = PipelineStage.FILTERING;
        if (this.enableScoring && this.minScoreThreshold > 0 && companies.length > 0) {
            const before = companies.length;
            companies = companies.filter(c => c.score !== undefined && c.score.total >= this.minScoreThreshold);
            state.metrics.stats.filteredOut = before - companies.length;
            this.logger.info(`Filtered by score threshold (${this.minScoreThreshold}): ${companies.length}/${before} companies`);
        } else {
            state.skipped.push(PipelineStage.FILTERING);
        }

        this.stage = PipelineStage.DONE;
        const stats = state.metrics.finish(companies.length);
        this.logger.info(`Pipeline run completed: ${state.runId} in ${stats.durationMs}ms, ${companies.length} companies`, { ...stats });

        return {
            runId: state.runId,
            companies,
            errors: state.errors,
            warnings: state.warnings,
            cancelled: false,
            skippedStages: state.skipped,
            stats,
        };
    }

    /**
     * Runs every source under the worker limit. Batches are merged as each
     * task settles, so cross-source order follows completion order.
     */
    private async collect(sources: SourceTask[], state: RunState, signal?: AbortSignal): Promise<Company[]> {
        const aggregate: Company[] = [];
        if (sources.length === 0) return aggregate;

        const limit = pLimit(this.maxWorkers);
        await Promise.all(sources.map(task => limit(async () => {
            if (signal?.aborted) return;
            const batch = await this.runSource(task, signal);
            if (!batch || signal?.aborted) return;
            this.mergeBatch(task, batch, aggregate, state);
        })));

        return aggregate;
    }

    private async runSource(task: SourceTask, signal?: AbortSignal): Promise<BatchResult | null> {
        const abort = signal ? whenAborted(signal) : null;
        try {
            const running = task.run(signal);
            return abort ? await Promise.race([running, abort.promise]) : await running;
        } catch (e) {
            const failure = new AdapterFailure(task.name, `Unhandled error in ${task.name}: ${errorMessage(e)}`);
            this.logger.error(failure.message, { adapter: task.name });
            const batch = createBatchResult(DataSource.OTHER);
            addError(batch, failure.message);
            return batch;
        } finally {
            abort?.dispose();
        }
    }

    private mergeBatch(task: SourceTask, batch: BatchResult, aggregate: Company[], state: RunState) {
        state.metrics.recordBatch(batch.succeeded, batch.records.length);

        if (!batch.succeeded) {
            const detail = batch.errors.length > 0 ? batch.errors.join('; ') : 'failed without error detail';
            this.logger.error(`${task.name} failed: ${detail}`);
            state.errors.push(`${task.name}: ${detail}`);
            return;
        }

        aggregate.push(...batch.records);
        for (const message of [...batch.errors, ...batch.warnings]) {
            state.warnings.push(`${task.name}: ${message}`);
        }
        this.logger.info(`${task.name}: ${batch.records.length} companies in ${batch.elapsedMs}ms`);
    }

    /** Returns false when the run was cancelled part way. */
    private async enrich(companies: Company[], state: RunState, signal?: AbortSignal): Promise<boolean> {
        this.logger.info(`Enriching ${companies.length} companies with ${this.enrichers.length} enrichers`);

        for (const enricher of this.enrichers) {
            if (signal?.aborted) return false;
            this.logger.info(`Enriching with ${enricher.name}`);

            // Enrichers may return a copy instead of mutating, so keep what they return
            for (const [index, company] of companies.entries()) {
                try {
                    companies[index] = await enricher.enrichRecord(company);
                } catch (e) {
                    const message = `${enricher.name} failed for ${company.name}: ${errorMessage(e)}`;
                    this.logger.error(`Error enriching ${company.name} with ${enricher.name}`, { error: errorMessage(e) });
                    state.warnings.push(message);
                    state.metrics.recordEnrichmentFailure();
                }
            }
        }

        return true;
    }

    private applyRules(rules: RulesEngine, companies: Company[], state: RunState) {
        for (const company of companies) {
            try {
                company.extraData.rules = rules.apply(company);
            } catch (e) {
                this.logger.error(`Error applying rules to ${company.name}`, { error: errorMessage(e) });
                state.warnings.push(`rules failed for ${company.name}: ${errorMessage(e)}`);
            }
        }
    }

    private cancel(state: RunState): PipelineResult {
        this.logger.warn(`Pipeline run cancelled: ${state.runId} during ${this.stage}. Partial results discarded.`);
        this.stage = PipelineStage.DONE;
        return {
            runId: state.runId,
            companies: [],
            errors: state.errors,
            warnings: state.warnings,
            cancelled: true,
            skippedStages: state.skipped,
            stats: state.metrics.finish(0),
        };
    }
}
