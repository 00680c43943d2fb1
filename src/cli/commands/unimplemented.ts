/**
 * @fileoverview Declared queries without an implementation
 */

import { UnimplementedQueryError } from '../../core/errors.js';

export type UnimplementedQuery = 'num-traces' | 'trace' | 'feature';

export async function unimplementedQueryCommand(query: UnimplementedQuery): Promise<never> {
  throw new UnimplementedQueryError(query);
}
