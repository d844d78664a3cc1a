import type { Id } from '../types.js';

export interface Entity {
  readonly id: Id;
}
