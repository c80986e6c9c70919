import { DocumentSummary, summarizeRecord } from '../domain/document/document-types';
import { RecordStore } from '../store/record-store';

const RECENT_DOCUMENT_COUNT = 5;

export interface RegistryStatistics {
  totalDocuments: number;
  byType: Record<string, number>;
  byUser: Record<string, number>;
  recentDocuments: DocumentSummary[];
}

export class StatisticsService {
  constructor(private store: RecordStore) {}

  async getStatistics(): Promise<RegistryStatistics> {
    // Keys are caller-supplied names, so counts live in Maps until the end
    const byType = new Map<string, number>();
    const byUser = new Map<string, number>();
    const documents: DocumentSummary[] = [];

    for await (const record of this.store.iterateAll()) {
      const summary = summarizeRecord(record);
      byType.set(summary.documentType, (byType.get(summary.documentType) ?? 0) + 1);
      byUser.set(record.ownerNamespace, (byUser.get(record.ownerNamespace) ?? 0) + 1);
      documents.push({ ...summary, creationDate: record.creationTimestampIso });
    }

    documents.sort((a, b) => (a.creationDate < b.creationDate ? 1 : a.creationDate > b.creationDate ? -1 : 0));

    return {
      totalDocuments: documents.length,
      byType: Object.fromEntries(byType),
      byUser: Object.fromEntries(byUser),
      recentDocuments: documents.slice(0, RECENT_DOCUMENT_COUNT),
    };
  }
}
