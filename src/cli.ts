#!/usr/bin/env tsx
import path from 'path';
import { Command, Option } from 'commander';
import { loadConfig } from './config';
import { Pipeline } from './pipeline';
import { buildSourceTasks, loadSources } from './sources';
import { CompanySizeEstimator, DomainEnricher, GeographicEnricher } from './modules/enrichers';
import { DataExporter } from './modules/exporter';
import { RulesEngine, isHighValueTarget } from './modules/scorer';
import { Logger } from './modules/observability';
import { ExportFormat } from './types';
import { errorMessage } from './utils/errors';

type RunOptions = {
    sources: string;
    config?: string;
    output?: string;
    format?: ExportFormat;
    file?: string;
    minScore?: string;
    dedup: boolean;
    enrichment: boolean;
    scoring: boolean;
    dns: boolean;
};

const program = new Command();

program
    .name('lead-pipeline')
    .description('Collect, deduplicate and score company leads from several sources')
    .version('1.0.0');

program
    .command('run')
    .description('Run the collection pipeline over the sources listed in a YAML file')
    .requiredOption('-s, --sources <path>', 'Sources YAML file')
    .option('-c, --config <path>', 'Path to custom config YAML')
    .option('-o, --output <dir>', 'Output directory')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['csv', 'json']))
    .option('--file <name>', 'Output file name without extension')
    .option('--min-score <score>', 'Minimum total score (0-100)')
    .option('--no-dedup', 'Disable deduplication')
    .option('--no-enrichment', 'Disable enrichment')
    .option('--no-scoring', 'Disable lead scoring')
    .option('--no-dns', 'Skip the DNS lookup enricher')
    .action(async (options: RunOptions) => {
        try {
            const config = loadConfig(options.config ? path.resolve(options.config) : undefined);
            if (options.minScore !== undefined) config.pipeline.min_score_threshold = Number(options.minScore);
            config.pipeline.enable_deduplication = config.pipeline.enable_deduplication && options.dedup;
            config.pipeline.enable_enrichment = config.pipeline.enable_enrichment && options.enrichment;
            config.pipeline.enable_scoring = config.pipeline.enable_scoring && options.scoring;

            const logger = new Logger({ level: config.logging.level, dir: config.logging.dir });
            const sources = buildSourceTasks(loadSources(path.resolve(options.sources)), config, logger);

            const enrichers = [new CompanySizeEstimator(), new GeographicEnricher()];
            const rules = new RulesEngine().addRule('high_value_target', isHighValueTarget);
            const pipeline = Pipeline.fromConfig(config, logger, options.dns ? [...enrichers, new DomainEnricher()] : enrichers, rules);

            const controller = new AbortController();
            process.once('SIGINT', () => {
                logger.warn('[Shutdown] Received SIGINT. Cancelling run...');
                controller.abort();
            });

            const result = await pipeline.run(sources, controller.signal);
            if (result.cancelled) {
                console.error('Run cancelled. No output written.');
                process.exitCode = 130;
                return;
            }

            const exporter = new DataExporter(path.resolve(options.output ?? config.output.dir), logger);
            const written = await exporter.export(result.companies, options.format ?? config.output.format, options.file);

            console.log(`Companies: ${result.companies.length} (errors: ${result.errors.length}, warnings: ${result.warnings.length})`);
            console.log(written ? `Output: ${written}` : 'Nothing to export.');
        } catch (e) {
            console.error('Fatal Error:', errorMessage(e));
            process.exit(1);
        }
    });

program.parseAsync(process.argv).catch((e: unknown) => {
    console.error('Fatal Error:', errorMessage(e));
    process.exit(1);
});
