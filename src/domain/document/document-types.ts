import {
  HashCode,
  ShortCode,
  OwnerNamespace,
  TraceId
} from '../../domain-types';

export type FormValue = string | number | boolean | null;
export type FormFields = Record<string, FormValue>;

export interface DocumentRecord {
  version: string;
  traceId: TraceId;
  hashCode: HashCode;
  shortCode: ShortCode;
  algorithm: string;
  // Units written by other client tools may carry a digest that is not SHA-256 hex
  contentHash: string;
  metadataHash: string;
  combinedHash: string;
  ownerNamespace: OwnerNamespace;
  clientName: string;
  documentType: string;
  documentTypeDisplay: string;
  fileName: string;
  fileSize: number;
  creationTimestamp: string;
  creationTimestampIso: string;
  formData: FormFields;
}

export interface DocumentTypeInfo {
  code: string;
  display: string;
}

export const DOCUMENT_TYPES: Readonly<Record<string, DocumentTypeInfo>> = {
  CM: { code: 'carta_manifestacion', display: 'Carta de Manifestacion' },
  IA: { code: 'informe_auditoria', display: 'Informe de Auditoria' },
  CE: { code: 'carta_encargo', display: 'Carta de Encargo' },
  IR: { code: 'informe_revision', display: 'Informe de Revision' },
  OT: { code: 'otros', display: 'Otros Documentos' },
};

export const DEFAULT_TYPE_PREFIX = 'OT';

export function getDocumentType(prefix: string): DocumentTypeInfo | null {
  return DOCUMENT_TYPES[prefix.toUpperCase()] ?? null;
}

// Condensed view used by partial search and statistics
export interface DocumentSummary {
  hashCode: HashCode;
  shortCode: ShortCode;
  documentType: string;
  clientName: string;
  creationDate: string;
  ownerNamespace: OwnerNamespace;
}

export function summarizeRecord(record: DocumentRecord): DocumentSummary {
  return {
    hashCode: record.hashCode,
    shortCode: record.shortCode,
    documentType: record.documentTypeDisplay || 'Unknown',
    clientName: record.clientName || 'Unknown',
    creationDate: record.creationTimestampIso || record.creationTimestamp,
    ownerNamespace: record.ownerNamespace,
  };
}
