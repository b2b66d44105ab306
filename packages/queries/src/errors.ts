/**
 * Query Errors
 */

import { BozonError, formatErrorMessage, lookupDefinition } from '@bozon/core';

/** Errors raised by the query engine itself, not by a query's computation */
export class QueryError extends BozonError {
  readonly query: string;
  readonly key: string;

  constructor(errorId: string, query: string, key: string) {
    lookupDefinition(errorId, 'query');
    const context = { query, key };
    super({
      errorId,
      message: formatErrorMessage(errorId, context),
      context,
    });
    this.name = 'QueryError';
    this.query = query;
    this.key = key;
  }
}
