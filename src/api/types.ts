/**
 * Document registry REST API types
 */

import { DocumentTypeInfo } from '../domain/document/document-types';
import { PersistedUnit } from '../domain/document/document-record';

// ============================================
// COMMON TYPES
// ============================================

export interface ApiErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    correlationId?: string;
  };
}

// ============================================
// VERIFICATION
// ============================================

export interface VerificationResponse {
  success: true;
  message: string;
  metadata: PersistedUnit;
}

export interface IntegrityResponse {
  valid: boolean;
  hash_code: string;
  calculated_hash: string;
  stored_hash: string;
  message: string;
}

// ============================================
// REGISTRATION
// ============================================

export interface RegistrationResponse {
  success: true;
  message: string;
  hash_code: string;
  short_code: string;
  path: string;
  metadata: PersistedUnit;
}

// ============================================
// SEARCH & STATISTICS
// ============================================

export interface SearchResultItem {
  hash_code: string;
  short_code: string;
  document_type: string;
  client_name: string;
  creation_date: string;
}

export interface SearchResponse {
  success: true;
  query: string;
  count: number;
  results: SearchResultItem[];
}

export interface RecentDocumentItem extends SearchResultItem {
  user_id: string;
}

export interface StatsResponse {
  total_documents: number;
  by_type: Record<string, number>;
  by_user: Record<string, number>;
  recent_documents: RecentDocumentItem[];
}

export interface DocumentTypesResponse {
  success: true;
  types: Record<string, DocumentTypeInfo>;
}
