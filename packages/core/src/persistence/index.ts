export * from './blob-store';
export * from './codecs';
export * from './repositories';
