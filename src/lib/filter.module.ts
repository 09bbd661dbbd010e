import { Module } from '@nestjs/common';

import { FILTER_MODULE_OPTIONS } from './constants';
import { FilterService } from './filter.service';
import { ParseFilterPipe } from './provider/parse-filter.pipe';

import type { FilterModuleAsyncOptions, FilterModuleOptions } from './interface';
import type { DynamicModule } from '@nestjs/common';

/**
 * @example
 * ```typescript
 * @Module({
 *     imports: [FilterModule.forRoot({ logging: true, limits: { maxDepth: 2, maxConditions: 20 } })],
 * })
 * export class AppModule {}
 * ```
 */
@Module({})
export class FilterModule {
    static forRoot(options: FilterModuleOptions = {}): DynamicModule {
        return {
            module: FilterModule,
            global: true,
            providers: [{ provide: FILTER_MODULE_OPTIONS, useValue: options }, FilterService, ParseFilterPipe],
            exports: [FILTER_MODULE_OPTIONS, FilterService, ParseFilterPipe],
        };
    }

    static forRootAsync(options: FilterModuleAsyncOptions): DynamicModule {
        return {
            module: FilterModule,
            global: true,
            imports: options.imports ?? [],
            providers: [
                { provide: FILTER_MODULE_OPTIONS, useFactory: options.useFactory, inject: options.inject ?? [] },
                FilterService,
                ParseFilterPipe,
            ],
            exports: [FILTER_MODULE_OPTIONS, FilterService, ParseFilterPipe],
        };
    }
}
