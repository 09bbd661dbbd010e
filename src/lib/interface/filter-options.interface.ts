import type { FieldAccessorRegistry } from '../provider/field-accessor.registry';
import type { FilterLogger } from '../provider/filter-logger';
import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';

/**
 * Options shared by `evaluate` and `compile`.
 */
export interface FilterEngineOptions {
    /** Source of "now" for date presets and relative windows. Read once per call. */
    clock?: () => Date;
    /** Defaults to the process-wide registry */
    registry?: FieldAccessorRegistry;
    logger?: FilterLogger;
}

/**
 * UI-level editing limits. Not enforced by evaluation.
 */
export interface FilterEditLimits {
    /** Deepest nesting a new group may be created at (root = 0) */
    maxDepth?: number;
    /** Upper bound on `totalConditionCount` */
    maxConditions?: number;
}

export interface FilterModuleOptions {
    logging?: boolean;
    clock?: () => Date;
    limits?: FilterEditLimits;
    registry?: FieldAccessorRegistry;
}

export interface FilterModuleAsyncOptions extends Pick<ModuleMetadata, 'imports'> {
    useFactory: FactoryProvider<FilterModuleOptions>['useFactory'];
    inject?: FactoryProvider['inject'];
}
