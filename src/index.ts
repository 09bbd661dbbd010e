import 'reflect-metadata';

export * from './lib/constants';
export * from './lib/dto';
export * from './lib/filter.error';
export * from './lib/filter.module';
export * from './lib/filter.service';
export * from './lib/interface';
export * from './lib/model';
export * from './lib/provider';
export * from './lib/utils';
