import { BatchResult, Company, CompanySize, DataSource } from '../src/types';
import { SourceTask } from '../src/modules/adapters';
import {
  addError,
  addRecord,
  createBatchResult,
  createCompany,
  createEnrichment,
  createHiringIntent,
  createTechStack,
} from '../src/types/factories';

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Total 80.5: intent 80, fit 90, tech 90, engagement 50. */
export const hotLead = (name = 'Test Startup Inc'): Company => createCompany({
  name,
  website: 'https://teststartup.example',
  description: 'A test startup building developer tools',
  source: DataSource.MANUAL,
  enrichment: createEnrichment({
    companySize: CompanySize.SMALL,
    employeeCount: 45,
    hiringIntent: createHiringIntent({ isHiring: true, totalOpenPositions: 8, recentPostings: 5 }),
    techStack: createTechStack({
      frameworks: ['React', 'Django'],
      databases: ['PostgreSQL'],
      cloudProviders: ['AWS'],
    }),
  }),
});

/** Total 15: only the neutral fit score of an unenriched record. */
export const coldLead = (name = 'Quiet Holdings'): Company => createCompany({ name });

/** A task that resolves with the given records after a delay. */
export const fixedTask = (name: string, records: Company[], delayMs = 0): SourceTask => ({
  name,
  run: async () => {
    await delay(delayMs);
    const batch = createBatchResult(DataSource.OTHER);
    for (const record of records) addRecord(batch, record);
    return batch;
  },
});

/** A task whose batch reports the given error. */
export const failingTask = (name: string, error: string): SourceTask => ({
  name,
  run: async () => {
    const batch = createBatchResult(DataSource.OTHER);
    addError(batch, error);
    return batch;
  },
});

/** A task that never settles, like a request with no timeout. */
export const hangingTask = (name: string): SourceTask => ({
  name,
  run: () => new Promise<BatchResult>(() => { }),
});

const NAMES = [
  'Acme', 'Globex', 'Initech', 'Umbrella', 'Hooli', 'Vandelay',
  'Stark', 'Wayne', 'Cyberdyne', 'Soylent', 'Tyrell', 'Wonka',
];

/** Companies with distinct domains and dissimilar names. */
export const distinctCompanies = (count: number, offset = 0): Company[] =>
  NAMES.slice(offset, offset + count).map(name => createCompany({
    name,
    domain: `${name.toLowerCase()}.example`,
  }));
