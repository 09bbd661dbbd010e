export * from './filter-definition.dto';
