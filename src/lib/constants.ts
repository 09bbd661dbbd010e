export const FILTER_MODULE_OPTIONS = 'FILTER_MODULE_OPTIONS';

export const FILTER_LOGGER_CONTEXT = 'FilterTree';

/** Prefix of the named parameters emitted by the SQL renderer */
export const SQL_PARAMETER_PREFIX = 'filter_';

/** Shape of `Date#toISOString`, the only text read back as an instant */
export const ROUND_TRIP_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

export const CONDITION_ID_LENGTH = 8;

export const DEFAULT_MAX_DEPTH = 3;
