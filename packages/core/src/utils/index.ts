export * from './logger';
export * from './temp-dir';
