import * as crypto from 'crypto';
import { HashCode, OwnerNamespace, ShortCode, TraceId } from '../domain-types';
import {
  DEFAULT_TYPE_PREFIX,
  DocumentRecord,
  FormFields,
  getDocumentType
} from '../domain/document/document-types';
import {
  deriveShortCode,
  generateHashCode,
  isValidHashCode,
  normalizeCode,
  typePrefixOf
} from '../domain/document/hash-code';
import {
  HASH_ALGORITHM,
  computeBufferHash,
  computeCombinedHash,
  isValidSha256
} from '../domain/document/content-hash';
import {
  RECORD_FORMAT_VERSION,
  computeMetadataHash,
  formatCreationTimestamp
} from '../domain/document/document-record';
import { AlreadyExistsError, InvalidFormatError } from '../errors';
import { RecordStore } from '../store/record-store';

export interface RegisterDocumentCommand {
  hashCode?: string;
  // Used to generate a code when hashCode is absent
  typePrefix?: string;
  ownerNamespace: string;
  contentHash?: string;
  clientName?: string;
  documentType?: string;
  documentTypeDisplay?: string;
  fileName?: string;
  fileSize?: number;
  formData?: FormFields;
  overwrite?: boolean;
}

export type RegistrationErrorCode =
  | 'INVALID_FORMAT'
  | 'INVALID_NAMESPACE'
  | 'INVALID_CONTENT_HASH'
  | 'ALREADY_EXISTS';

export interface RegistrationResult {
  success: boolean;
  message: string;
  path?: string;
  hashCode?: HashCode;
  shortCode?: ShortCode;
  errorCode?: RegistrationErrorCode;
  record?: DocumentRecord;
}

function failure(errorCode: RegistrationErrorCode, message: string, hashCode?: HashCode): RegistrationResult {
  return { success: false, errorCode, message, hashCode };
}

export class RegistrationService {
  constructor(
    private store: RecordStore,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Validates and writes a new document record.
   *
   * Rejections (bad code, bad namespace, duplicate code) come back as failed results;
   * only storage failures are thrown.
   */
  async register(command: RegisterDocumentCommand): Promise<RegistrationResult> {
    let hashCode: HashCode;
    if (command.hashCode !== undefined) {
      const supplied = normalizeCode(command.hashCode);
      if (!isValidHashCode(supplied)) {
        return failure(
          'INVALID_FORMAT',
          `Invalid hash format: ${command.hashCode}. Expected: XX-XXXXXXXXXXXX`
        );
      }
      hashCode = supplied;
    } else {
      try {
        hashCode = generateHashCode(command.typePrefix ?? DEFAULT_TYPE_PREFIX);
      } catch (error) {
        if (error instanceof InvalidFormatError) {
          return failure('INVALID_FORMAT', error.message);
        }
        throw error;
      }
    }

    const ownerNamespace = OwnerNamespace.sanitize(command.ownerNamespace);
    if (!ownerNamespace) {
      return failure('INVALID_NAMESPACE', 'ownerNamespace is required and cannot be empty', hashCode);
    }

    const contentHash = command.contentHash ? command.contentHash.trim().toLowerCase() : '';
    if (contentHash && !isValidSha256(contentHash)) {
      return failure('INVALID_CONTENT_HASH', 'contentHash must be a 64-character hex SHA-256 digest', hashCode);
    }

    const record = this.buildRecord(command, hashCode, ownerNamespace, contentHash);

    try {
      const written = await this.store.put(record, command.overwrite ?? false);

      console.log('[Registration] Document registered', {
        hashCode,
        shortCode: record.shortCode,
        ownerNamespace,
        traceId: record.traceId,
        location: written.location,
        replaced: written.replaced,
      });

      return {
        success: true,
        message: 'Document registered successfully',
        path: written.location,
        hashCode,
        shortCode: record.shortCode,
        record,
      };
    } catch (error) {
      if (error instanceof AlreadyExistsError) {
        return failure('ALREADY_EXISTS', error.message, hashCode);
      }
      throw error;
    }
  }

  /**
   * Registers a document from its raw bytes, deriving contentHash and fileSize
   */
  async registerContent(command: RegisterDocumentCommand, content: Uint8Array): Promise<RegistrationResult> {
    const contentHash = await computeBufferHash(content);
    return this.register({
      ...command,
      contentHash,
      fileSize: command.fileSize ?? content.byteLength,
    });
  }

  private buildRecord(
    command: RegisterDocumentCommand,
    hashCode: HashCode,
    ownerNamespace: OwnerNamespace,
    contentHash: string
  ): DocumentRecord {
    const typeInfo = getDocumentType(typePrefixOf(hashCode));
    const now = this.clock();

    const descriptive = {
      documentType: command.documentType ?? typeInfo?.code ?? '',
      documentTypeDisplay: command.documentTypeDisplay ?? typeInfo?.display ?? '',
      fileName: command.fileName ?? '',
      fileSize: command.fileSize ?? 0,
      clientName: command.clientName ?? '',
      formData: { ...(command.formData ?? {}) },
    };

    return {
      version: RECORD_FORMAT_VERSION,
      traceId: crypto.randomUUID() as TraceId,
      hashCode,
      shortCode: deriveShortCode(hashCode),
      algorithm: HASH_ALGORITHM,
      contentHash: isValidSha256(contentHash) ? contentHash : '',
      metadataHash: computeMetadataHash(descriptive),
      combinedHash: contentHash ? computeCombinedHash(hashCode, contentHash) : '',
      ownerNamespace,
      ...descriptive,
      creationTimestamp: formatCreationTimestamp(now),
      creationTimestampIso: now.toISOString(),
    };
  }
}
