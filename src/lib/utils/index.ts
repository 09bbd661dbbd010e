export * from './column-kind-map';
export * from './field-value.util';
