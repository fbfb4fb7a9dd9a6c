import axios, { AxiosInstance } from 'axios';
import { BatchResult, DataSource } from '../../types';
import { addError } from '../../types/factories';
import { AdapterFailure, NetworkError, errorMessage } from '../../utils/errors';
import { RetryOptions, RetryPolicy } from '../../utils/retry';
import { Logger } from '../observability';
import { BaseAdapter } from './base';

export type JsonApiConfig = {
    url: string;
    /** Dotted path to the item array inside the response body, e.g. "data.companies". */
    itemsPath?: string;
    maxRecords?: number;
};

export interface JsonApiOptions {
    name?: string;
    source?: DataSource;
    client?: AxiosInstance;
    retry?: Partial<RetryOptions>;
    timeoutMs?: number;
    userAgent?: string;
}

// 429 and 5xx are worth another attempt, other HTTP errors are not
const isRetryableStatus = (status: number) => status === 429 || status >= 500;

const readPath = (body: unknown, itemsPath?: string): unknown => {
    if (!itemsPath) return body;
    let current: unknown = body;
    for (const key of itemsPath.split('.')) {
        if (typeof current !== 'object' || current === null) return undefined;
        current = Reflect.get(current, key);
    }
    return current;
};

export class JsonApiAdapter extends BaseAdapter<JsonApiConfig> {
    readonly name: string;
    readonly retry: RetryPolicy;
    private client: AxiosInstance;

    constructor(logger: Logger, options: JsonApiOptions = {}) {
        super(options.source ?? DataSource.API, logger);
        this.retry = new RetryPolicy({
            retryOn: (error) => error instanceof NetworkError,
            ...options.retry
        }, this.logger);

        this.name = options.name ?? 'json-api';
        this.client = options.client ?? axios.create({
            timeout: options.timeoutMs ?? 30000,
            headers: {
                'User-Agent': options.userAgent ?? 'lead-pipeline/1.0',
                'Accept': 'application/json',
            }
        });
    }

    protected async collect(config: JsonApiConfig, batch: BatchResult, signal?: AbortSignal): Promise<void> {
        let target: URL;
        try {
            target = new URL(config.url);
        } catch {
            addError(batch, `${this.name}: invalid url "${config.url}"`);
            return;
        }

        const body = await this.retry.execute(() => this.fetchJson(target.toString(), signal), `${this.name} GET ${target.host}`, signal);
        const items = readPath(body, config.itemsPath);
        if (!Array.isArray(items)) {
            addError(batch, `${this.name}: no item array at "${config.itemsPath ?? '<root>'}"`);
            return;
        }

        this.addItems(batch, items, config.maxRecords, target.toString());
    }

    private async fetchJson(url: string, signal?: AbortSignal): Promise<unknown> {
        try {
            const response = await this.client.get<unknown>(url, { signal });
            return response.data;
        } catch (e) {
            if (axios.isAxiosError(e) && e.response) {
                const status = e.response.status;
                if (isRetryableStatus(status)) {
                    throw new NetworkError(`HTTP ${status} from ${url}`, { status });
                }
                throw new AdapterFailure(this.name, `HTTP ${status} from ${url}`);
            }
            if (signal?.aborted) throw e;
            throw new NetworkError(`Request to ${url} failed: ${errorMessage(e)}`);
        }
    }
}
