export { BaseAdapter, RawCompanySchema, parseRawCompany, sourceTask } from './base';
export type { RawCompany, SourceAdapter, SourceTask } from './base';
export { StaticListAdapter } from './static-list';
export type { StaticListConfig } from './static-list';
export { JsonApiAdapter } from './json-api';
export type { JsonApiConfig, JsonApiOptions } from './json-api';
