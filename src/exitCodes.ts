/**
 * Process exit codes for the freshen CLI.
 *
 * Task failures and setup problems get distinct codes so that scripts can tell them apart.
 */

export const EXIT_SUCCESS = 0;
export const EXIT_TASK_FAILED = 1;
export const EXIT_INVALID_COMMAND = 2;
export const EXIT_ENVIRONMENT_ERROR = 3;
