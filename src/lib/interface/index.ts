export * from './field-accessor.interface';
export * from './filter-expression.interface';
export * from './filter-field.interface';
export * from './filter-operator.interface';
export * from './filter-options.interface';
export * from './filter-value.interface';
