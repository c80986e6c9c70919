import { DocumentRecord, DocumentSummary, summarizeRecord } from '../domain/document/document-types';
import { CodeKind, classifyCode, normalizeCode } from '../domain/document/hash-code';
import { InvalidFormatError, NotFoundError } from '../errors';
import { RecordStore } from '../store/record-store';

export const MIN_PARTIAL_QUERY_LENGTH = 3;
export const DEFAULT_SEARCH_LIMIT = 10;

export type LookupResult =
  | { status: 'FOUND'; record: DocumentRecord; matchedBy: CodeKind }
  | { status: 'NOT_FOUND'; code: string; error: NotFoundError }
  | { status: 'INVALID_FORMAT'; code: string; error: InvalidFormatError };

export type LookupFailure = Exclude<LookupResult, { status: 'FOUND' }>;

export type SearchResult =
  | { status: 'OK'; query: string; results: DocumentSummary[] }
  | { status: 'INVALID_FORMAT'; query: string; error: InvalidFormatError };

/**
 * Resolves user-supplied codes by scanning every record in the store.
 *
 * There is no index: full codes match `hashCode`, short codes match the stored
 * `shortCode`, and the first match in store order wins. Short codes can collide,
 * and a collision resolves to whichever record the store enumerates first.
 */
export class LookupService {
  constructor(private store: RecordStore) {}

  async resolve(code: string): Promise<LookupResult> {
    const normalized = normalizeCode(code);
    const kind = classifyCode(normalized);

    if (!kind) {
      return {
        status: 'INVALID_FORMAT',
        code: normalized,
        error: new InvalidFormatError(
          'Invalid hash code format. Expected XX-XXXXXXXXXXXX (e.g., CM-A1B2C3D4E5F6) or a 6-character short code',
          { code }
        ),
      };
    }

    for await (const record of this.store.iterateAll()) {
      const candidate = kind === 'FULL' ? record.hashCode : record.shortCode;
      if (candidate === normalized) {
        return { status: 'FOUND', record, matchedBy: kind };
      }
    }

    return { status: 'NOT_FOUND', code: normalized, error: new NotFoundError(normalized) };
  }

  /**
   * Substring search over full hash codes, in scan order
   */
  async searchPartial(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<SearchResult> {
    const normalized = normalizeCode(query);
    if (normalized.length < MIN_PARTIAL_QUERY_LENGTH) {
      return {
        status: 'INVALID_FORMAT',
        query: normalized,
        error: new InvalidFormatError(
          `Search query must be at least ${MIN_PARTIAL_QUERY_LENGTH} characters`,
          { query }
        ),
      };
    }

    const results: DocumentSummary[] = [];
    if (limit <= 0) {
      return { status: 'OK', query: normalized, results };
    }

    for await (const record of this.store.iterateAll()) {
      if (record.hashCode.includes(normalized)) {
        results.push(summarizeRecord(record));
        if (results.length >= limit) break;
      }
    }
    return { status: 'OK', query: normalized, results };
  }
}
