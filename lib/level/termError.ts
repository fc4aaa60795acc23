/**
 * Term error definitions.
 *
 * This module defines the error type raised when a level term or one of the
 * reduction parameters is malformed.
 *
 * @module
 */
export class TermError extends Error {}
