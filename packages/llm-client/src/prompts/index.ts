export * from './generation-request';
export * from './corrective';
export * from './sentence.prompt';
export * from './feedback.prompt';
