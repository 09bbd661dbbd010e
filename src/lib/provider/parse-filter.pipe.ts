import { BadRequestException, Inject, Injectable, Optional } from '@nestjs/common';

import { FILTER_MODULE_OPTIONS } from '../constants';
import { FilterParseError } from '../filter.error';
import { FilterDefinition } from '../model/filter-definition';
import { deserialize, fromJson } from './filter-serializer';
import { FilterLogger } from './filter-logger';

import type { FilterModuleOptions } from '../interface';
import type { PipeTransform } from '@nestjs/common';

/**
 * Reads a filter tree from a query string (JSON text) or a request body (parsed JSON).
 * A missing value reads as the empty filter.
 *
 * @example
 * ```typescript
 * @Get()
 * list(@Query('filter', ParseFilterPipe) filter: FilterDefinition) {
 *     return this.filterService.filterItems(this.people, filter, PERSON_FIELDS, Person);
 * }
 * ```
 */
@Injectable()
export class ParseFilterPipe implements PipeTransform<unknown, FilterDefinition> {
    private readonly logger: FilterLogger;

    constructor(@Optional() @Inject(FILTER_MODULE_OPTIONS) options?: FilterModuleOptions) {
        this.logger = new FilterLogger(options?.logging ?? false);
    }

    transform(value: unknown): FilterDefinition {
        if (value instanceof FilterDefinition) {
            return value;
        }
        if (value === undefined || value === null || value === '') {
            return new FilterDefinition();
        }

        try {
            return typeof value === 'string' ? deserialize(value) : fromJson(value);
        } catch (error) {
            if (error instanceof FilterParseError) {
                this.logger.warn(error.details.length > 0 ? error.details : error.message, 'ValidationError');
                throw new BadRequestException(error.details.length > 0 ? [...error.details] : [error.message]);
            }
            throw error;
        }
    }
}
