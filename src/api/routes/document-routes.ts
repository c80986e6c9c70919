import express, { Router, Request, Response, NextFunction } from 'express';
import { RegistrationService, RegistrationResult } from '../../application/registration-service';
import { LookupService } from '../../application/lookup-service';
import { IntegrityService } from '../../application/integrity-service';
import { StatisticsService } from '../../application/statistics-service';
import { DOCUMENT_TYPES, DocumentSummary } from '../../domain/document/document-types';
import { toPersistedUnit } from '../../domain/document/document-record';
import {
  integrityQuerySchema,
  registerDocumentSchema,
  searchQuerySchema
} from '../schemas/document-schemas';
import {
  ApiErrorBody,
  DocumentTypesResponse,
  IntegrityResponse,
  RegistrationResponse,
  SearchResponse,
  SearchResultItem,
  StatsResponse,
  VerificationResponse
} from '../types';

const MAX_SEARCH_LIMIT = 100;

export interface DocumentRouteDeps {
  registration: RegistrationService;
  lookup: LookupService;
  integrity: IntegrityService;
  statistics: StatisticsService;
  maxUploadBytes: number;
}

function toSearchItem(summary: DocumentSummary): SearchResultItem {
  return {
    hash_code: summary.hashCode,
    short_code: summary.shortCode,
    document_type: summary.documentType,
    client_name: summary.clientName,
    creation_date: summary.creationDate,
  };
}

function registrationStatus(result: RegistrationResult): number {
  return result.errorCode === 'ALREADY_EXISTS' ? 409 : 400;
}

export function createDocumentRoutes(deps: DocumentRouteDeps): Router {
  const router = Router();

  /**
   * GET /document-types
   */
  router.get('/document-types', (req: Request, res: Response) => {
    const body: DocumentTypesResponse = { success: true, types: { ...DOCUMENT_TYPES } };
    res.json(body);
  });

  /**
   * POST /documents
   * Registers a document; the hash code is generated when not supplied
   */
  router.post('/documents', express.json({ limit: deps.maxUploadBytes }), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { contentBase64, ...command } = registerDocumentSchema.parse(req.body);

      const result = contentBase64 && !command.contentHash
        ? await deps.registration.registerContent(command, Buffer.from(contentBase64, 'base64'))
        : await deps.registration.register(command);

      if (!result.success || !result.record || !result.hashCode || !result.shortCode || !result.path) {
        const body: ApiErrorBody = {
          success: false,
          error: {
            code: result.errorCode ?? 'REGISTRATION_FAILED',
            message: result.message,
            correlationId: req.correlationId,
          },
        };
        res.status(registrationStatus(result)).json(body);
        return;
      }

      const body: RegistrationResponse = {
        success: true,
        message: result.message,
        hash_code: result.hashCode,
        short_code: result.shortCode,
        path: result.path,
        metadata: toPersistedUnit(result.record),
      };
      res.status(201).json(body);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /verify/integrity?hash_code=XX-XXXXXXXXXXXX
   * Body: the raw document bytes, any content type
   */
  router.post('/verify/integrity', express.raw({ type: () => true, limit: deps.maxUploadBytes }), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { hash_code: hashCode } = integrityQuerySchema.parse(req.query);

      const content: unknown = req.body;
      if (!Buffer.isBuffer(content) || content.length === 0) {
        const body: ApiErrorBody = {
          success: false,
          error: {
            code: 'EMPTY_FILE',
            message: 'Empty file provided',
            correlationId: req.correlationId,
          },
        };
        res.status(400).json(body);
        return;
      }

      const outcome = await deps.integrity.verifyIntegrity(hashCode, content);
      if (outcome.status !== 'VERIFIED') {
        next(outcome.error);
        return;
      }

      const { result } = outcome;
      const body: IntegrityResponse = {
        valid: result.valid,
        hash_code: result.hashCode,
        calculated_hash: result.calculatedHash,
        stored_hash: result.storedHash,
        message: result.message,
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /verify/:code
   * Accepts a full hash code or a 6-character short code
   */
  router.get('/verify/:code', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const lookup = await deps.lookup.resolve(req.params.code);
      if (lookup.status !== 'FOUND') {
        next(lookup.error);
        return;
      }

      const body: VerificationResponse = {
        success: true,
        message: 'Document found and verified',
        metadata: toPersistedUnit(lookup.record),
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /search?q=A1B2
   */
  router.get('/search', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { q, limit } = searchQuerySchema.parse(req.query);
      const search = await deps.lookup.searchPartial(q, Math.min(limit, MAX_SEARCH_LIMIT));
      if (search.status !== 'OK') {
        next(search.error);
        return;
      }

      const body: SearchResponse = {
        success: true,
        query: q,
        count: search.results.length,
        results: search.results.map(toSearchItem),
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /stats
   */
  router.get('/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await deps.statistics.getStatistics();
      const body: StatsResponse = {
        total_documents: stats.totalDocuments,
        by_type: stats.byType,
        by_user: stats.byUser,
        recent_documents: stats.recentDocuments.map(summary => ({
          ...toSearchItem(summary),
          user_id: summary.ownerNamespace,
        })),
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
