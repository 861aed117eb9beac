/** Printed by every generated entry point on normal completion */
export const SUCCESS_MARKER = '✅ Code sample executed successfully';

/** Prefix of the line printed before a nonzero exit; the error message follows */
export const FAILURE_MARKER = '❌ Error: ';
