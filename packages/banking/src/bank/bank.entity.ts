import {
  type Entity,
  type Id,
  type IdentifierAllocator,
  type Name,
  type ValidatedScalar,
  type ValidationError,
  defaultIdentifierAllocator,
} from '@ledgerimage/core';
import { type BankNameLimits, getBankNameLimits } from '@ledgerimage/env';
import { getLogger } from '@ledgerimage/logger';
import type { Result } from 'neverthrow';

import { bankNameScalar } from './bank-name.js';

const logger = getLogger('Bank');

/**
 * Options for creating a Bank
 */
export interface CreateBankOptions {
  /** Identifier source; the process-wide allocator when omitted */
  ids?: IdentifierAllocator;
  /** Name length bounds; read from the environment when omitted */
  limits?: BankNameLimits;
}

/**
 * Bank Entity
 *
 * Domain Rules:
 * - Name is whitespace-normalized before it is checked or stored
 * - Name cannot be blank (1000)
 * - Name length must be within the configured bounds (1001)
 *
 * The name has no public setter. Renaming goes through `renameTo`, the one
 * place where rules spanning several banks would be enforced.
 */
export class Bank implements Entity {
  /**
   * Factory method to create a new Bank. An identifier is allocated only
   * once the name is accepted.
   */
  static create(name: Name, options: CreateBankOptions = {}): Result<Bank, ValidationError> {
    const limits = options.limits ?? getBankNameLimits();
    const ids = options.ids ?? defaultIdentifierAllocator;

    return bankNameScalar(name, limits)
      .map((nameScalar) => {
        const bank = new Bank(ids.next(), nameScalar);
        logger.debug({ bankId: bank.id, name: bank.name }, 'Bank created');
        return bank;
      })
      .mapErr((error) => {
        logger.debug({ code: error.code, reason: error.reason }, 'Bank creation rejected');
        return error;
      });
  }

  private constructor(
    private readonly _id: Id,
    private readonly _name: ValidatedScalar<Name>
  ) {}

  get id(): Id {
    return this._id;
  }

  get name(): Name {
    return this._name.get();
  }

  /**
   * Renames the bank.
   * @returns the previous name; on failure the name is unchanged
   */
  renameTo(newName: Name): Result<Name, ValidationError> {
    return this._name
      .replace(newName)
      .map((previousName) => {
        logger.debug({ bankId: this._id, from: previousName, to: this.name }, 'Bank renamed');
        return previousName;
      })
      .mapErr((error) => {
        logger.warn({ bankId: this._id, code: error.code, reason: error.reason }, 'Bank rename rejected');
        return error;
      });
  }

  /**
   * Returns the state for serialization
   */
  getState() {
    return {
      id: this._id,
      name: this.name,
    };
  }
}
