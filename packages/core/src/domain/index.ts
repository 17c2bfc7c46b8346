export * from './enums';
export * from './sentence';
export * from './feedback';
export * from './vocabulary';
export * from './stats';
