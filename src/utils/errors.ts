/**
 * Error classes shared by the pipeline.
 * Stage-local failures (adapter, enrichment) are caught and logged by the
 * orchestrator; ConfigurationError is raised before a run starts.
 */

export class PipelineError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ConfigurationError extends PipelineError {
    constructor(message: string, public issues: string[] = []) {
        super(message, 'CONFIG_ERROR', { fatal: true, issues });
    }
}

export class ValidationError extends PipelineError {
    constructor(message: string) {
        super(message, 'VALIDATION_ERROR', { fatal: false });
    }
}

export class NetworkError extends PipelineError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'NETWORK_ERROR', context);
    }
}

export class AdapterFailure extends PipelineError {
    constructor(public adapter: string, message: string) {
        super(message, 'ADAPTER_FAILURE', { adapter });
    }
}

export class EnrichmentFailure extends PipelineError {
    constructor(public enricher: string, public company: string, message: string) {
        super(message, 'ENRICHMENT_FAILURE', { enricher, company });
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
