/**
 * Export Types
 */

export type CSVValue = string | number | boolean | null | undefined;
