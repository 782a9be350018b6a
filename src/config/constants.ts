/**
 * Configuration constants
 */

export const SIMPLE_CONFIG_FILENAME = 'config.txt';
export const STRUCTURED_CONFIG_FILENAME = 'config.xml';

// Token replaced by the task identifier in output paths and references
export const TASK_PREFIX_PLACEHOLDER = '$PREFIX';

export const CONFIG_STRING_SEPARATOR = '|';
export const CONFIG_STRING_ASSIGNMENT = '=';

export const ENTRY_SEPARATOR = '/';

export const ZIP_CONTAINER_EXTS = new Set(['.zip', '.epub']);

export const LOG_PREFIX = '[syncjob]';
