/**
 * Graph Store - snapshot persistence per (profile, account)
 *
 * Layout: <root>/<profile>/<accountId>/snapshot.json, each name run through
 * encodeStoreName.
 *
 * Saves go to a temp file in the target directory and are renamed into
 * place, so a reader sees either the previous snapshot or the new one.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { IamGraphErrorCode, StorageError } from '../errors/errors.js';
import { PrincipalGraph } from '../graph/principal-graph.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { EffectivePermissions } from '../resolver/types.js';
import { compareStrings } from '../utils/sort.js';
import {
  SNAPSHOT_FORMAT,
  SNAPSHOT_FORMAT_VERSION,
  SnapshotFileSchema,
  SnapshotHeaderSchema,
  type SnapshotFile,
  type SnapshotMetadata,
} from './schema.js';

// ============================================================================
// Types
// ============================================================================

export const SNAPSHOT_FILE = 'snapshot.json';

/**
 * A stored graph with the data needed to answer queries and to speed up
 * the next build
 */
export interface GraphSnapshot {
  metadata: SnapshotMetadata;
  graph: PrincipalGraph;
  resolutionCache: EffectivePermissions[];
}

/**
 * File operations the store needs. Defaults to node:fs/promises.
 */
export interface SnapshotFileSystem {
  mkdir(dir: string): Promise<void>;
  writeFile(filePath: string, content: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(target: string): Promise<void>;
  readFile(filePath: string): Promise<string>;
  readdir(dir: string): Promise<string[]>;
  mtimeMs(filePath: string): Promise<number>;
}

export interface GraphStoreOptions {
  logger?: Logger | undefined;
  fileSystem?: SnapshotFileSystem | undefined;
}

export const nodeFileSystem: SnapshotFileSystem = {
  mkdir: async dir => {
    await fs.mkdir(dir, { recursive: true });
  },
  writeFile: (filePath, content) => fs.writeFile(filePath, content, 'utf-8'),
  rename: (from, to) => fs.rename(from, to),
  remove: target => fs.rm(target, { recursive: true, force: true }),
  readFile: filePath => fs.readFile(filePath, 'utf-8'),
  readdir: dir => fs.readdir(dir),
  mtimeMs: async filePath => (await fs.stat(filePath)).mtimeMs,
};

// ============================================================================
// Helpers
// ============================================================================

function isNotFound(error: unknown): boolean {
  return error instanceof Error && Reflect.get(error, 'code') === 'ENOENT';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reversible directory name for a profile or account id: every byte
 * outside [A-Za-z0-9_-] becomes %XX, and the empty name becomes "%".
 * Distinct names never share a directory.
 */
export function encodeStoreName(name: string): string {
  if (name === '') return '%';
  let encoded = '';
  for (const byte of Buffer.from(name, 'utf-8')) {
    const char = String.fromCharCode(byte);
    encoded += /[A-Za-z0-9_-]/.test(char) ? char : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return encoded;
}

/**
 * Readable file name fragment, e.g. for exported images. Lossy.
 */
export function sanitizeName(name: string): string {
  const safe = name.replace(/[^A-Za-z0-9._-]/g, '_');
  if (safe === '' || /^\.+$/.test(safe)) {
    return safe.replace(/\./g, '_') || '_';
  }
  return safe;
}

function toSnapshotFile(snapshot: GraphSnapshot): SnapshotFile {
  const data = snapshot.graph.toData();
  return {
    format: SNAPSHOT_FORMAT,
    formatVersion: SNAPSHOT_FORMAT_VERSION,
    metadata: snapshot.metadata,
    nodes: data.nodes,
    edges: data.edges,
    warnings: data.warnings,
    resolutionCache: [...snapshot.resolutionCache].sort(
      (a, b) => compareStrings(a.principalArn, b.principalArn) || compareStrings(a.policyHash, b.policyHash)
    ),
  };
}

// ============================================================================
// Graph Store
// ============================================================================

export class GraphStore {
  private readonly logger: Logger;
  private readonly files: SnapshotFileSystem;

  constructor(
    public readonly rootDir: string,
    options: GraphStoreOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.files = options.fileSystem ?? nodeFileSystem;
  }

  snapshotPath(profile: string, accountId: string): string {
    return path.join(this.rootDir, encodeStoreName(profile), encodeStoreName(accountId), SNAPSHOT_FILE);
  }

  /**
   * Persist a snapshot, replacing the previous one for the same
   * (profile, account). Returns the file path.
   */
  async save(snapshot: GraphSnapshot): Promise<string> {
    const { profile, accountId } = snapshot.metadata;
    const filePath = this.snapshotPath(profile, accountId);
    const tempPath = `${filePath}.${crypto.randomUUID()}.tmp`;
    const content = `${JSON.stringify(toSnapshotFile(snapshot), null, 2)}\n`;

    try {
      await this.files.mkdir(path.dirname(filePath));
      await this.files.writeFile(tempPath, content);
      await this.files.rename(tempPath, filePath);
    } catch (error) {
      await this.files.remove(tempPath);
      throw new StorageError(filePath, `write failed: ${errorMessage(error)}`, error);
    }

    this.logger.debug(`Saved snapshot to ${filePath}`);
    return filePath;
  }

  /**
   * Load a snapshot. Without an account id, the most recently written
   * snapshot of the profile is used.
   */
  async load(profile: string, accountId?: string): Promise<GraphSnapshot> {
    const filePath = accountId !== undefined
      ? this.snapshotPath(profile, accountId)
      : await this.latestSnapshotPath(profile);
    const file = await this.readSnapshotFile(filePath);
    const { metadata } = file;
    if (metadata.profile !== profile || (accountId !== undefined && metadata.accountId !== accountId)) {
      throw new StorageError(
        filePath,
        `snapshot belongs to profile '${metadata.profile}' account ${metadata.accountId}, not profile '${profile}'${accountId !== undefined ? ` account ${accountId}` : ''}`
      );
    }

    return {
      metadata: file.metadata,
      graph: new PrincipalGraph({ nodes: file.nodes, edges: file.edges, warnings: file.warnings }),
      resolutionCache: file.resolutionCache,
    };
  }

  /**
   * Load a snapshot, or undefined when none is stored. Corrupt snapshots
   * still throw.
   */
  async tryLoad(profile: string, accountId?: string): Promise<GraphSnapshot | undefined> {
    try {
      return await this.load(profile, accountId);
    } catch (error) {
      if (error instanceof StorageError && error.code === IamGraphErrorCode.SNAPSHOT_NOT_FOUND) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Metadata of every stored snapshot, sorted by profile then account.
   * Unreadable snapshots are logged and left out.
   */
  async list(): Promise<SnapshotMetadata[]> {
    const result: SnapshotMetadata[] = [];

    for (const profileDir of await this.listDir(this.rootDir)) {
      for (const accountDir of await this.listDir(path.join(this.rootDir, profileDir))) {
        const filePath = path.join(this.rootDir, profileDir, accountDir, SNAPSHOT_FILE);
        try {
          result.push((await this.readSnapshotFile(filePath)).metadata);
        } catch (error) {
          if (!(error instanceof StorageError)) throw error;
          if (error.code !== IamGraphErrorCode.SNAPSHOT_NOT_FOUND) {
            this.logger.warn(error.message);
          }
        }
      }
    }

    return result.sort(
      (a, b) => compareStrings(a.profile, b.profile) || compareStrings(a.accountId, b.accountId)
    );
  }

  /**
   * Remove a stored snapshot. Returns false when there was none.
   */
  async delete(profile: string, accountId: string): Promise<boolean> {
    const filePath = this.snapshotPath(profile, accountId);
    const dir = path.dirname(filePath);
    const entries = await this.listDir(dir);
    if (entries.length === 0) return false;

    try {
      await this.files.remove(dir);
    } catch (error) {
      throw new StorageError(dir, `delete failed: ${errorMessage(error)}`, error);
    }
    this.logger.debug(`Deleted snapshot ${filePath}`);
    return true;
  }

  private async listDir(dir: string): Promise<string[]> {
    try {
      return (await this.files.readdir(dir)).sort(compareStrings);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new StorageError(dir, `cannot read directory: ${errorMessage(error)}`, error);
    }
  }

  private async latestSnapshotPath(profile: string): Promise<string> {
    const profileDir = path.join(this.rootDir, encodeStoreName(profile));
    let latest: { filePath: string; mtimeMs: number } | undefined;

    for (const accountDir of await this.listDir(profileDir)) {
      const filePath = path.join(profileDir, accountDir, SNAPSHOT_FILE);
      let mtimeMs: number;
      try {
        mtimeMs = await this.files.mtimeMs(filePath);
      } catch (error) {
        if (isNotFound(error)) continue;
        throw new StorageError(filePath, `cannot stat snapshot: ${errorMessage(error)}`, error);
      }
      // Account directories are visited in sorted order; ties keep the first
      if (!latest || mtimeMs > latest.mtimeMs) {
        latest = { filePath, mtimeMs };
      }
    }

    if (!latest) {
      throw new StorageError(
        profileDir,
        `no snapshot stored for profile '${profile}'`,
        undefined,
        IamGraphErrorCode.SNAPSHOT_NOT_FOUND
      );
    }
    return latest.filePath;
  }

  private async readSnapshotFile(filePath: string): Promise<SnapshotFile> {
    let content: string;
    try {
      content = await this.files.readFile(filePath);
    } catch (error) {
      if (isNotFound(error)) {
        throw new StorageError(filePath, 'snapshot not found', error, IamGraphErrorCode.SNAPSHOT_NOT_FOUND);
      }
      throw new StorageError(filePath, `read failed: ${errorMessage(error)}`, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StorageError(filePath, `malformed JSON: ${errorMessage(error)}`, error);
    }

    const header = SnapshotHeaderSchema.safeParse(raw);
    if (!header.success || header.data.format !== SNAPSHOT_FORMAT) {
      throw new StorageError(filePath, 'not an iamgraph snapshot');
    }
    if (header.data.formatVersion !== SNAPSHOT_FORMAT_VERSION) {
      throw new StorageError(
        filePath,
        `unsupported format version ${header.data.formatVersion} (expected ${SNAPSHOT_FORMAT_VERSION})`
      );
    }

    const parsed = SnapshotFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'invalid content';
      throw new StorageError(filePath, `schema mismatch at ${where}`);
    }
    return parsed.data;
  }
}
