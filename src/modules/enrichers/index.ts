export type { Enricher } from './types';
export { CompanySizeEstimator, sizeForEmployees } from './company-size';
export { GeographicEnricher } from './geographic';
export { DomainEnricher } from './domain';
export type { HostResolver } from './domain';
