import { z } from 'zod';
import {
  HashCode,
  OwnerNamespace,
  Result,
  TraceId
} from '../../domain-types';
import { DocumentRecord, FormFields } from './document-types';
import { deriveShortCode, isValidHashCode } from './hash-code';
import { HASH_ALGORITHM, isValidSha256, sha256Hex } from './content-hash';

export const RECORD_FORMAT_VERSION = '1.0';

const formValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// Units written by other client tools may omit any optional field
export const persistedUnitSchema = z.object({
  version: z.string().default(RECORD_FORMAT_VERSION),
  trace_id: z.string().default(''),
  hash_info: z.object({
    hash_code: z.string().min(1),
    short_code: z.string().default(''),
    algorithm: z.string().default(HASH_ALGORITHM),
    content_hash: z.string().default(''),
    metadata_hash: z.string().default(''),
    combined_hash: z.string().default(''),
    file_size: z.number().nonnegative().optional(),
  }),
  document_info: z.object({
    type: z.string().default(''),
    type_display: z.string().default(''),
    file_name: z.string().default(''),
    file_size: z.number().nonnegative().optional(),
    creation_timestamp: z.string().default(''),
    creation_timestamp_iso: z.string().default(''),
  }).default({}),
  user_info: z.object({
    user_id: z.string().default(''),
    client_name: z.string().default(''),
  }).default({}),
  form_data: z.record(formValueSchema).default({}),
});

export type PersistedUnit = z.output<typeof persistedUnitSchema>;

export function toPersistedUnit(record: DocumentRecord): PersistedUnit {
  return {
    version: record.version,
    trace_id: record.traceId,
    hash_info: {
      hash_code: record.hashCode,
      short_code: record.shortCode,
      algorithm: record.algorithm,
      content_hash: record.contentHash,
      metadata_hash: record.metadataHash,
      combined_hash: record.combinedHash,
      file_size: record.fileSize,
    },
    document_info: {
      type: record.documentType,
      type_display: record.documentTypeDisplay,
      file_name: record.fileName,
      file_size: record.fileSize,
      creation_timestamp: record.creationTimestamp,
      creation_timestamp_iso: record.creationTimestampIso,
    },
    user_info: {
      user_id: record.ownerNamespace,
      client_name: record.clientName,
    },
    form_data: { ...record.formData },
  };
}

/**
 * Validates raw unit content and maps it onto a DocumentRecord.
 *
 * Failure reasons are returned rather than thrown so a scan can log and skip the unit.
 * `fallbackNamespace` is the grouping the unit was found under; it is used when the
 * unit does not name its owner.
 */
export function fromPersistedUnit(raw: unknown, fallbackNamespace?: string): Result<DocumentRecord, string> {
  const parsed = persistedUnitSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return Result.err(`invalid unit: ${issue.path.join('.') || '(root)'} ${issue.message}`);
  }
  const unit = parsed.data;

  const hashCode = unit.hash_info.hash_code.toUpperCase();
  if (!isValidHashCode(hashCode)) {
    return Result.err(`invalid hash code '${unit.hash_info.hash_code}'`);
  }

  const derived = deriveShortCode(hashCode);
  const storedShortCode = unit.hash_info.short_code.toUpperCase();
  if (storedShortCode && storedShortCode !== derived) {
    return Result.err(`short code '${storedShortCode}' does not match hash code ${hashCode}`);
  }

  // Kept verbatim when it is not a SHA-256 digest; integrity checks then report a mismatch
  const storedHash = unit.hash_info.content_hash;
  const contentHash = isValidSha256(storedHash) ? storedHash.toLowerCase() : storedHash;

  const ownerNamespace = unit.user_info.user_id || fallbackNamespace || '';
  if (!ownerNamespace) {
    return Result.err(`no owner namespace for ${hashCode}`);
  }

  return Result.ok({
    version: unit.version,
    traceId: unit.trace_id as TraceId,
    hashCode,
    shortCode: derived,
    algorithm: unit.hash_info.algorithm,
    contentHash,
    metadataHash: unit.hash_info.metadata_hash,
    combinedHash: unit.hash_info.combined_hash,
    ownerNamespace: ownerNamespace as OwnerNamespace,
    clientName: unit.user_info.client_name,
    documentType: unit.document_info.type,
    documentTypeDisplay: unit.document_info.type_display,
    fileName: unit.document_info.file_name,
    fileSize: unit.document_info.file_size ?? unit.hash_info.file_size ?? 0,
    creationTimestamp: unit.document_info.creation_timestamp,
    creationTimestampIso: unit.document_info.creation_timestamp_iso,
    formData: unit.form_data,
  });
}

/**
 * Unit names embed the hash code and a trace prefix, e.g. metadata_CM_A1B2C3D4E5F6_1f0c9a7e.json
 */
export function unitFileName(hashCode: HashCode, traceId: TraceId): string {
  return `${unitFilePrefix(hashCode)}${traceId.slice(0, 8)}.json`;
}

export function unitFilePrefix(hashCode: HashCode): string {
  return `metadata_${hashCode.replace(/-/g, '_')}_`;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

// DD/MM/YYYY HH:mm:ss in server local time
export function formatCreationTimestamp(date: Date): string {
  return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Digest over the descriptive fields, in persisted order
 */
export function computeMetadataHash(fields: {
  documentType: string;
  documentTypeDisplay: string;
  fileName: string;
  fileSize: number;
  clientName: string;
  formData: FormFields;
}): string {
  return sha256Hex(JSON.stringify({
    type: fields.documentType,
    type_display: fields.documentTypeDisplay,
    file_name: fields.fileName,
    file_size: fields.fileSize,
    client_name: fields.clientName,
    form_data: fields.formData,
  }));
}
