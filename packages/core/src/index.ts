export const VERSION = '0.1.0';

export * from './domain';
export * from './srs';
export * from './persistence';
export * from './validation/validator';
export * from './services/vocab-bank.service';
export * from './services/stats.service';
