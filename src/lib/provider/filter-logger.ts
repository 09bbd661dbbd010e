import { Logger } from '@nestjs/common';

import { FILTER_LOGGER_CONTEXT } from '../constants';

/**
 * Nest `Logger` behind an on/off switch.
 * Degraded conditions (unknown field, coercion failure, operator mismatch) are reported at debug level.
 */
export class FilterLogger {
    private readonly logger = new Logger(FILTER_LOGGER_CONTEXT);

    constructor(private readonly enabled: boolean = false) {}

    get isEnabled(): boolean {
        return this.enabled;
    }

    debug(message: unknown, context?: string): void {
        if (!this.enabled) {
            return;
        }
        this.logger.debug(message, context ?? FILTER_LOGGER_CONTEXT);
    }

    warn(message: unknown, context?: string): void {
        if (!this.enabled) {
            return;
        }
        this.logger.warn(message, context ?? FILTER_LOGGER_CONTEXT);
    }
}

export const silentFilterLogger = new FilterLogger(false);
