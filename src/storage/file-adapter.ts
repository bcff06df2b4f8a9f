/**
 * File Storage Adapter
 *
 * JSON file-based storage adapter for persistent storage.
 * Uses atomic writes to prevent data corruption.
 * Includes SHA-256 integrity verification to detect tampering.
 */

import { createHash } from 'crypto';
import * as fsPromises from 'fs/promises';
import * as path from 'path';
import { Agreement } from '../types';
import { ErrorCode, StorageError } from '../errors';
import {
  AgreementStorageAdapter,
  SerializedAgreement,
  cloneAgreement,
  deserializeAgreement,
  isSerializedAgreement,
  selectRecent,
  serializeAgreement,
} from './adapter';

export interface FileStorageConfig {
  /**
   * Path to the storage file
   */
  filePath: string;

  /**
   * Whether to create the file if it doesn't exist
   */
  createIfMissing?: boolean;

  /**
   * Whether to pretty-print JSON (default: false)
   */
  prettyPrint?: boolean;
}

const FORMAT_VERSION = 1;

interface StorageFileFormat {
  version: number;
  updated_at: string;
  agreements: SerializedAgreement[];
  checksum?: string; // SHA-256 hash of the agreements array
}

function checksumOf(agreements: SerializedAgreement[]): string {
  return createHash('sha256').update(JSON.stringify(agreements)).digest('hex');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FileStorageAdapter implements AgreementStorageAdapter {
  private agreements: Map<string, Agreement> = new Map();
  private filePath: string;
  private createIfMissing: boolean;
  private prettyPrint: boolean;
  private initialized = false;

  constructor(config: FileStorageConfig) {
    this.filePath = path.resolve(config.filePath);
    this.createIfMissing = config.createIfMissing ?? true;
    this.prettyPrint = config.prettyPrint ?? false;
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await fsPromises.mkdir(path.dirname(this.filePath), { recursive: true });

    let content: string | null;
    try {
      content = await fsPromises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        throw new StorageError(
          `Failed to read storage file: ${describeError(error)}`,
          ErrorCode.STORAGE_READ_FAILED,
          { operation: 'initialize' },
          { cause: error }
        );
      }
      content = null;
    }

    if (content !== null) {
      this.load(content);
    } else if (this.createIfMissing) {
      await this.saveToFile();
    } else {
      throw new StorageError(
        `Storage file not found: ${this.filePath}`,
        ErrorCode.STORAGE_READ_FAILED,
        { operation: 'initialize' }
      );
    }

    this.initialized = true;
  }

  async save(agreement: Agreement): Promise<void> {
    this.ensureInitialized();
    this.agreements.set(agreement.agreement_id, cloneAgreement(agreement));
    await this.saveToFile();
  }

  async get(agreementId: string): Promise<Agreement | null> {
    this.ensureInitialized();
    const agreement = this.agreements.get(agreementId);
    return agreement ? cloneAgreement(agreement) : null;
  }

  async getAll(): Promise<Agreement[]> {
    this.ensureInitialized();
    return Array.from(this.agreements.values()).map(cloneAgreement);
  }

  async loadRecent(limit: number): Promise<Agreement[]> {
    this.ensureInitialized();
    return selectRecent(Array.from(this.agreements.values()), limit).map(cloneAgreement);
  }

  async count(): Promise<number> {
    this.ensureInitialized();
    return this.agreements.size;
  }

  async clear(): Promise<void> {
    this.ensureInitialized();
    this.agreements.clear();
    await this.saveToFile();
  }

  async close(): Promise<void> {
    if (this.initialized) {
      await this.saveToFile();
    }
    this.initialized = false;
  }

  /**
   * Gets the file path being used
   */
  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Parses and verifies file content
   */
  private load(content: string): void {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new StorageError(
        `Storage file is not valid JSON: ${describeError(error)}`,
        ErrorCode.STORAGE_READ_FAILED,
        { operation: 'load' },
        { cause: error }
      );
    }

    if (typeof data !== 'object' || data === null || !('version' in data) || !('agreements' in data)) {
      throw new StorageError('Storage file has no agreements section', ErrorCode.STORAGE_READ_FAILED, {
        operation: 'load',
      });
    }

    if (data.version !== FORMAT_VERSION) {
      throw new StorageError(
        `Unsupported storage file version: ${String(data.version)}`,
        ErrorCode.STORAGE_READ_FAILED,
        { operation: 'load' }
      );
    }

    const records = data.agreements;
    if (!Array.isArray(records) || !records.every(isSerializedAgreement)) {
      throw new StorageError(
        'Storage file contains malformed agreement records',
        ErrorCode.STORAGE_INTEGRITY_VIOLATION,
        { operation: 'load' }
      );
    }

    if ('checksum' in data && typeof data.checksum === 'string') {
      if (checksumOf(records) !== data.checksum) {
        throw new StorageError(
          'Agreement file integrity check failed: the checksum does not match its contents',
          ErrorCode.STORAGE_INTEGRITY_VIOLATION,
          { operation: 'load' }
        );
      }
    }

    this.agreements.clear();
    for (const record of records) {
      const agreement = deserializeAgreement(record);
      this.agreements.set(agreement.agreement_id, agreement);
    }
  }

  /**
   * Saves agreements to the storage file using atomic write
   */
  private async saveToFile(): Promise<void> {
    const agreements = Array.from(this.agreements.values()).map(serializeAgreement);

    const data: StorageFileFormat = {
      version: FORMAT_VERSION,
      updated_at: new Date().toISOString(),
      agreements,
      checksum: checksumOf(agreements),
    };

    const content = this.prettyPrint ? JSON.stringify(data, null, 2) : JSON.stringify(data);

    // Atomic write: write to temp file, then rename
    const tempPath = `${this.filePath}.tmp`;
    try {
      await fsPromises.writeFile(tempPath, content, { mode: 0o600, encoding: 'utf-8' });
      await fsPromises.rename(tempPath, this.filePath);
    } catch (error) {
      await fsPromises.rm(tempPath, { force: true });
      throw new StorageError(
        `Failed to save storage file: ${describeError(error)}`,
        ErrorCode.STORAGE_WRITE_FAILED,
        { operation: 'save' },
        { cause: error }
      );
    }
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new StorageError(
        'FileStorageAdapter has not been initialized. Call initialize() first.',
        ErrorCode.STORAGE_NOT_INITIALIZED
      );
    }
  }
}
