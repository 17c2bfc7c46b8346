export * from './intervals';
export * from './ladder-scheduler';
export * from './review-queue';
export * from './review-round';
export type { SessionOptions, ReviewOutcomeHandler, ReviewCallbacks } from './srs.interface';
