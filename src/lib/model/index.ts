export * from './filter-condition';
export * from './filter-definition';
export * from './filter-value';
