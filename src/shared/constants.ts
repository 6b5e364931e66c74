/**
 * Application-wide constants
 */

/** Execution retries driven by runtime errors (at most this + 1 executions) */
export const MAX_ERROR_RETRIES = 3;

/** Regenerations driven by validator feedback */
export const MAX_VALIDATOR_RETRIES = 3;

/** Outer attempts of the copy refinement workflow */
export const MAX_COPY_ATTEMPTS = 5;

/** Separator used when several fenced blocks form one code unit */
export const CODE_BLOCK_SEPARATOR = '\n\n\n';

/** Prompt length above which the `auto` stream mode switches to streaming */
export const STREAM_PROMPT_THRESHOLD = 2000;

export const VALIDATION_CONTENT_LIMIT = 5000;
export const VALIDATION_CODE_LIMIT = 2000;
export const ERROR_DETAILS_LIMIT = 2000;
export const INSTALL_MESSAGE_LIMIT = 400;

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_ORACLE_TIMEOUT_MS = 120_000;
export const DEFAULT_ORACLE_MAX_RETRIES = 3;
export const DEFAULT_EXECUTION_TIMEOUT_MS = 300_000;
export const DEFAULT_INSTALL_TIMEOUT_MS = 180_000;

/** Directory (under the project and the user home) holding docmend state */
export const CONFIG_DIR_NAME = '.docmend';
