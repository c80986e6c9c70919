import { promises as fs } from 'fs';
import path from 'path';
import crypto from 'crypto';
import { HashCode } from '../domain-types';
import { DocumentRecord } from '../domain/document/document-types';
import {
  fromPersistedUnit,
  toPersistedUnit,
  unitFileName,
  unitFilePrefix
} from '../domain/document/document-record';
import {
  AlreadyExistsError,
  StoreBusyError,
  StoreUnavailableError,
  errorMessage
} from '../errors';
import { PutResult, RecordStore, reportCorruption } from './record-store';

const STORE_NAME = 'File Record Store';
const UNIT_FILE_PATTERN = /^metadata_.+\.json$/;
const LOCK_DIR = '.locks';

export interface FileRecordStoreOptions {
  outputDir: string;
  lockRetries?: number;
  lockRetryDelayMs?: number;
  lockStaleMs?: number;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function hasCode(error: unknown, code: string): boolean {
  return isErrnoException(error) && error.code === code;
}

/**
 * One JSON unit per document under `<outputDir>/<ownerNamespace>/`.
 *
 * Writes go through a hidden temp file that is renamed into place, and every put for a
 * given hash code runs under `<outputDir>/.locks/<hashCode>.lock`, created exclusively.
 */
export class FileRecordStore implements RecordStore {
  private readonly outputDir: string;
  private readonly lockRetries: number;
  private readonly lockRetryDelayMs: number;
  private readonly lockStaleMs: number;

  constructor(options: FileRecordStoreOptions) {
    this.outputDir = path.resolve(options.outputDir);
    this.lockRetries = options.lockRetries ?? 20;
    this.lockRetryDelayMs = options.lockRetryDelayMs ?? 25;
    this.lockStaleMs = options.lockStaleMs ?? 30_000;
  }

  async put(record: DocumentRecord, overwrite: boolean): Promise<PutResult> {
    const release = await this.acquireLock(record.hashCode);
    try {
      const existing = await this.findUnitPaths(record.hashCode);
      if (existing.length > 0 && !overwrite) {
        throw new AlreadyExistsError(record.hashCode);
      }

      const namespaceDir = path.join(this.outputDir, record.ownerNamespace);
      await fs.mkdir(namespaceDir, { recursive: true });

      const target = path.join(namespaceDir, unitFileName(record.hashCode, record.traceId));
      await this.writeAtomic(target, JSON.stringify(toPersistedUnit(record), null, 2));

      // Overwrite replaces the whole record, wherever the previous one was filed
      for (const previous of existing) {
        if (previous !== target) {
          await fs.rm(previous, { force: true });
        }
      }

      return {
        hashCode: record.hashCode,
        location: target,
        replaced: existing.length > 0,
      };
    } finally {
      await release();
    }
  }

  async getByHashCode(hashCode: HashCode): Promise<DocumentRecord | null> {
    for (const unitPath of await this.findUnitPaths(hashCode)) {
      const record = await this.readUnit(unitPath, path.basename(path.dirname(unitPath)));
      if (record && record.hashCode === hashCode) {
        return record;
      }
    }
    return null;
  }

  async exists(hashCode: HashCode): Promise<boolean> {
    const units = await this.findUnitPaths(hashCode);
    return units.length > 0;
  }

  async *iterateAll(): AsyncGenerator<DocumentRecord> {
    for (const namespace of await this.listNamespaces()) {
      const namespaceDir = path.join(this.outputDir, namespace);
      for (const fileName of await this.listUnitFiles(namespaceDir)) {
        const record = await this.readUnit(path.join(namespaceDir, fileName), namespace);
        if (record) {
          yield record;
        }
      }
    }
  }

  /**
   * Namespace directories sorted by name. A missing root is an empty store.
   */
  private async listNamespaces(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.outputDir, { withFileTypes: true });
      return entries
        .filter(entry => entry.isDirectory() && !entry.name.startsWith('.'))
        .map(entry => entry.name)
        .sort();
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        return [];
      }
      throw new StoreUnavailableError(`Cannot read store root ${this.outputDir}`, error);
    }
  }

  private async listUnitFiles(namespaceDir: string): Promise<string[]> {
    try {
      const names = await fs.readdir(namespaceDir);
      return names.filter(name => UNIT_FILE_PATTERN.test(name)).sort();
    } catch (error) {
      // Namespace removed mid-scan
      if (hasCode(error, 'ENOENT')) {
        return [];
      }
      throw new StoreUnavailableError(`Cannot read namespace directory ${namespaceDir}`, error);
    }
  }

  private async findUnitPaths(hashCode: HashCode): Promise<string[]> {
    const prefix = unitFilePrefix(hashCode);
    const matches: string[] = [];
    for (const namespace of await this.listNamespaces()) {
      const namespaceDir = path.join(this.outputDir, namespace);
      for (const fileName of await this.listUnitFiles(namespaceDir)) {
        if (fileName.startsWith(prefix)) {
          matches.push(path.join(namespaceDir, fileName));
        }
      }
    }
    return matches;
  }

  private async readUnit(unitPath: string, namespace: string): Promise<DocumentRecord | null> {
    let content: string;
    try {
      content = await fs.readFile(unitPath, 'utf-8');
    } catch (error) {
      // Superseded by an overwrite between listing and reading
      if (hasCode(error, 'ENOENT')) {
        return null;
      }
      reportCorruption(STORE_NAME, unitPath, errorMessage(error));
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      reportCorruption(STORE_NAME, unitPath, `unparsable JSON: ${errorMessage(error)}`);
      return null;
    }

    const parsed = fromPersistedUnit(raw, namespace);
    if (!parsed.ok) {
      reportCorruption(STORE_NAME, unitPath, parsed.error);
      return null;
    }
    return parsed.value;
  }

  private async writeAtomic(target: string, content: string): Promise<void> {
    const tempPath = path.join(
      path.dirname(target),
      `.${path.basename(target)}.${crypto.randomUUID()}.tmp`
    );
    try {
      await fs.writeFile(tempPath, content, { encoding: 'utf-8', flag: 'wx' });
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  private async acquireLock(hashCode: HashCode): Promise<() => Promise<void>> {
    const lockDir = path.join(this.outputDir, LOCK_DIR);
    try {
      await fs.mkdir(lockDir, { recursive: true });
    } catch (error) {
      throw new StoreUnavailableError(`Cannot create lock directory ${lockDir}`, error);
    }

    const lockPath = path.join(lockDir, `${hashCode}.lock`);
    for (let attempt = 1; attempt <= this.lockRetries; attempt++) {
      try {
        await fs.writeFile(
          lockPath,
          JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }),
          { flag: 'wx' }
        );
        return async () => {
          await fs.rm(lockPath, { force: true });
        };
      } catch (error) {
        if (!hasCode(error, 'EEXIST')) {
          throw new StoreUnavailableError(`Cannot create lock ${lockPath}`, error);
        }
      }

      if (await this.isStale(lockPath) && await this.breakStaleLock(hashCode, lockPath)) {
        continue;
      }

      await new Promise(resolve => setTimeout(resolve, this.lockRetryDelayMs * attempt));
    }

    throw new StoreBusyError(hashCode, this.lockRetries);
  }

  /**
   * Removes a stale lock under `<lock>.break`, created exclusively, so only one waiter
   * breaks it. Staleness is checked again under that guard: a lock another waiter has
   * re-created in the meantime is fresh and stays. A guard left behind by a crashed
   * waiter is cleared once it is stale itself.
   */
  private async breakStaleLock(hashCode: HashCode, lockPath: string): Promise<boolean> {
    const guardPath = `${lockPath}.break`;
    try {
      await fs.writeFile(guardPath, String(process.pid), { flag: 'wx' });
    } catch (error) {
      if (!hasCode(error, 'EEXIST')) {
        throw new StoreUnavailableError(`Cannot create lock guard ${guardPath}`, error);
      }
      if (await this.isStale(guardPath)) {
        await fs.rm(guardPath, { force: true });
      }
      return false;
    }

    try {
      if (!(await this.isStale(lockPath))) {
        return false;
      }
      console.warn(`[${STORE_NAME}] Breaking stale lock`, { hashCode, lockPath });
      await fs.rm(lockPath, { force: true });
      return true;
    } finally {
      await fs.rm(guardPath, { force: true });
    }
  }

  private async isStale(lockPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(lockPath);
      return Date.now() - stats.mtimeMs > this.lockStaleMs;
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        return false;
      }
      throw new StoreUnavailableError(`Cannot inspect lock ${lockPath}`, error);
    }
  }
}
