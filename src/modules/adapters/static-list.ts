import fs from 'fs/promises';
import { BatchResult, DataSource } from '../../types';
import { addError } from '../../types/factories';
import { Logger } from '../observability';
import { BaseAdapter } from './base';

export type StaticListConfig = {
    records?: unknown[];
    /** JSON file holding an array of raw company items. */
    file?: string;
    maxRecords?: number;
};

/**
 * Source backed by an in-memory list or a JSON file. Used for manual lead
 * lists and exports handed over by other tools.
 */
export class StaticListAdapter extends BaseAdapter<StaticListConfig> {
    readonly name: string;

    constructor(logger: Logger, name = 'static-list', source = DataSource.MANUAL) {
        super(source, logger);
        this.name = name;
    }

    protected async collect(config: StaticListConfig, batch: BatchResult): Promise<void> {
        if (config.records) {
            this.addItems(batch, config.records, config.maxRecords);
            return;
        }

        if (!config.file) {
            addError(batch, `${this.name}: either records or file must be configured`);
            return;
        }

        const items: unknown = JSON.parse(await fs.readFile(config.file, 'utf8'));
        if (!Array.isArray(items)) {
            addError(batch, `${this.name}: ${config.file} does not contain a JSON array`);
            return;
        }

        this.addItems(batch, items, config.maxRecords);
    }
}
