import { logger } from '../../shared/logger.js';
import { ValidationError } from '../../shared/errors.js';
import type { CachedToken, QueryColumnMetadata, QueryResponse, QueryResult } from '../types.js';
import { parseJson, send } from './request.js';

export class QueryRunner {
  private readonly timeoutMs: number | undefined;

  constructor(opts?: { timeoutMs?: number }) {
    this.timeoutMs = opts?.timeoutMs;
  }

  /** Run a SQL query and follow `nextBatchId` until every batch is fetched. */
  async run(token: CachedToken, sql: string): Promise<QueryResult> {
    if (!sql.trim()) {
      throw new ValidationError('Query text is empty');
    }

    logger.info({ sql }, 'Execute query');

    const first = parseJson<QueryResponse>(
      await send({
        operation: 'Query',
        method: 'POST',
        url: `${token.instanceUrl}/api/v2/query`,
        accessToken: token.accessToken,
        contentType: 'application/json',
        body: JSON.stringify({ sql }),
        expect: [200],
        timeoutMs: this.timeoutMs,
      }),
    );

    const rows = [...first.data];
    let page = first;

    while (!page.done && page.nextBatchId) {
      logger.info({ nextBatchId: page.nextBatchId }, 'Fetch next batch of results');
      page = parseJson<QueryResponse>(
        await send({
          operation: 'Query',
          method: 'GET',
          url: `${token.instanceUrl}/api/v2/query/${encodeURIComponent(page.nextBatchId)}`,
          accessToken: token.accessToken,
          expect: [200],
          timeoutMs: this.timeoutMs,
        }),
      );
      rows.push(...page.data);
    }

    logger.info({ queryId: first.queryId, rows: rows.length }, 'Query returned');

    return {
      queryId: first.queryId,
      columns: orderedColumns(first.metadata),
      metadata: first.metadata,
      rows,
      rowCount: rows.length,
    };
  }
}

export function orderedColumns(metadata: Record<string, QueryColumnMetadata>): string[] {
  return Object.entries(metadata)
    .sort(([, a], [, b]) => a.placeInOrder - b.placeInOrder)
    .map(([name]) => name);
}

/** Map positional rows to objects keyed by column name. */
export function toRecords(result: QueryResult): Record<string, unknown>[] {
  return result.rows.map((row) => {
    const record: Record<string, unknown> = {};
    result.columns.forEach((column, i) => {
      record[column] = row[i];
    });
    return record;
  });
}
