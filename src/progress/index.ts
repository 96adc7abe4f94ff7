export * from './organization-reporter';
