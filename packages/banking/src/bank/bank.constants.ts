/**
 * Stable error codes for bank validation rules, used for message lookup.
 */
export const BANK_ERROR_CODES = {
  NAME_BLANK: 1000,
  NAME_LENGTH: 1001,
} as const;
