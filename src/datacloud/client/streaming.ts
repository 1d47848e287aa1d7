import { logger } from '../../shared/logger.js';
import { ValidationError } from '../../shared/errors.js';
import type {
  CachedToken,
  IngestRow,
  StreamingIngestResponse,
  StreamingUpsertOptions,
} from '../types.js';
import { chunkByCount, splitJsonList } from '../split/json-chunker.js';
import { parseJson, send, withToken } from './request.js';
import type { TokenSource } from './request.js';

export const STREAMING_API_MAX_PAYLOAD_SIZE = 200 * 1000;
export const STREAMING_API_MAX_DELETE_IDS = 200;

/**
 * Streaming Ingest calls. Each chunk is its own request with its own 401
 * retry, so a token that expires mid-upload never resends accepted chunks.
 */
export class StreamingIngest {
  private readonly timeoutMs: number | undefined;

  constructor(
    private readonly tokens: TokenSource,
    opts?: { timeoutMs?: number },
  ) {
    this.timeoutMs = opts?.timeoutMs;
  }

  /**
   * Upsert rows through the streaming Ingest API, one request per
   * payload-sized chunk. Returns the body of the last accepted request.
   */
  async upsert(
    sourceApiName: string,
    objectName: string,
    rows: readonly IngestRow[],
    opts?: StreamingUpsertOptions,
  ): Promise<StreamingIngestResponse> {
    if (rows.length === 0) {
      throw new ValidationError('Streaming upsert needs at least one row');
    }

    const suffix = opts?.testMode ? '/actions/test' : '';
    if (opts?.testMode) {
      logger.info('Test mode selected, records will not be committed');
    }

    const chunks = splitJsonList(rows, STREAMING_API_MAX_PAYLOAD_SIZE);
    let result: StreamingIngestResponse = { accepted: false };

    for (const [i, chunk] of chunks.entries()) {
      const body = JSON.stringify({ data: chunk });
      const res = await withToken(this.tokens, (token) =>
        send({
          operation: 'Streaming UPSERT',
          method: 'POST',
          url: this.sourceUrl(token, sourceApiName, objectName) + suffix,
          accessToken: token.accessToken,
          contentType: 'application/json',
          body,
          expect: [200, 202],
          timeoutMs: this.timeoutMs,
        }),
      );
      result = res.body ? parseJson<StreamingIngestResponse>(res) : { accepted: true };
      logger.info(
        { sourceApiName, objectName, chunk: i + 1, of: chunks.length, rows: chunk.length },
        'Streaming upsert chunk accepted',
      );
    }

    return result;
  }

  /** Delete rows by primary key through the streaming Ingest API. */
  async delete(
    sourceApiName: string,
    objectName: string,
    ids: readonly string[],
  ): Promise<StreamingIngestResponse> {
    if (ids.length === 0) {
      throw new ValidationError('Streaming delete needs at least one id');
    }

    let result: StreamingIngestResponse = { accepted: false };

    for (const batch of chunkByCount(ids, STREAMING_API_MAX_DELETE_IDS)) {
      const query = new URLSearchParams({ ids: batch.join(',') }).toString();
      const res = await withToken(this.tokens, (token) =>
        send({
          operation: 'Streaming DELETE',
          method: 'DELETE',
          url: `${this.sourceUrl(token, sourceApiName, objectName)}?${query}`,
          accessToken: token.accessToken,
          expect: [200, 202],
          timeoutMs: this.timeoutMs,
        }),
      );
      result = res.body ? parseJson<StreamingIngestResponse>(res) : { accepted: true };
      logger.info({ sourceApiName, objectName, ids: batch.length }, 'Streaming delete accepted');
    }

    return result;
  }

  private sourceUrl(token: CachedToken, sourceApiName: string, objectName: string): string {
    return (
      `${token.instanceUrl}/api/v1/ingest/sources/` +
      `${encodeURIComponent(sourceApiName)}/${encodeURIComponent(objectName)}`
    );
  }
}
