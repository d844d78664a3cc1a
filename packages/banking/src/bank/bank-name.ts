import {
  type Name,
  type ValidatedScalar,
  type ValidationError,
  lengthRange,
  nonEmpty,
  normalizeSpace,
  stringScalar,
} from '@ledgerimage/core';
import type { BankNameLimits } from '@ledgerimage/env';
import type { Result } from 'neverthrow';

import { BANK_ERROR_CODES } from './bank.constants.js';

/**
 * Builds the validated name field of a bank.
 *
 * Whitespace is normalized first, then blank names are rejected before the
 * length check so a blank name is not reported as too short.
 */
export function bankNameScalar(initialName: Name, limits: BankNameLimits): Result<ValidatedScalar<Name>, ValidationError> {
  const { minLength, maxLength } = limits;

  return stringScalar()
    .normalizeWith(normalizeSpace)
    .rule(BANK_ERROR_CODES.NAME_BLANK, nonEmpty(), () => 'Bank name cannot be blank')
    .rule(
      BANK_ERROR_CODES.NAME_LENGTH,
      lengthRange(minLength, maxLength),
      (name) => `Invalid bank name length (${name.length}), must be between ${minLength} and ${maxLength}`
    )
    .build(initialName);
}
