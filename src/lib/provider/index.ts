export * from './date-range.resolver';
export * from './expression-evaluator';
export * from './field-accessor.registry';
export * from './filter-compiler';
export * from './filter-evaluator';
export * from './filter-logger';
export * from './filter-operator.helper';
export * from './filter-serializer';
export * from './parse-filter.pipe';
export * from './sql-expression.renderer';
