export { Bank, type CreateBankOptions } from './bank/bank.entity.js';
export { bankNameScalar } from './bank/bank-name.js';
export { BANK_ERROR_CODES } from './bank/bank.constants.js';
