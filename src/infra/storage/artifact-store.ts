/**
 * Artifact store
 *
 * Persists code units, commentary, uploads and archived documents under
 * collision-resistant names (timestamp plus a random id).
 */

import { randomUUID } from 'node:crypto';
import { copyFile, mkdir, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { createLogger } from '../../shared/utils/index.js';
import type { ScriptRuntime } from '../runtime/index.js';

const log = createLogger('artifact-store');

export interface ArtifactStore {
  /** Persist a code unit; returns its path */
  saveCode(label: string, code: string): Promise<string>;
  /** Persist text as a comment-only program; returns its path */
  saveCommentary(label: string, text: string): Promise<string>;
  /** Store uploaded bytes; returns the stored document path */
  storeUpload(fileName: string, bytes: Uint8Array): Promise<string>;
  /** Copy a document into the archive; returns the archived path */
  archiveDocument(path: string): Promise<string>;
}

export interface FileArtifactStoreOptions {
  codesDir: string;
  archiveDir: string;
  runtime: ScriptRuntime;
  clock?: () => number;
  idGenerator?: () => string;
}

/** File-name-safe stem: anything outside [A-Za-z0-9._-] becomes `_` */
export function cleanFileStem(fileName: string): string {
  const stem = basename(fileName, extname(fileName)).replace(/[^A-Za-z0-9._-]+/g, '_');
  return stem || 'document';
}

export class FileArtifactStore implements ArtifactStore {
  private readonly codesDir: string;
  private readonly archiveDir: string;
  private readonly runtime: ScriptRuntime;
  private readonly clock: () => number;
  private readonly idGenerator: () => string;

  constructor(options: FileArtifactStoreOptions) {
    this.codesDir = options.codesDir;
    this.archiveDir = options.archiveDir;
    this.runtime = options.runtime;
    this.clock = options.clock ?? Date.now;
    this.idGenerator = options.idGenerator ?? (() => randomUUID().slice(0, 8));
  }

  private uniqueSuffix(): string {
    return `${this.clock()}_${this.idGenerator()}`;
  }

  private async writeNew(dir: string, fileName: string, content: string | Uint8Array): Promise<string> {
    await mkdir(dir, { recursive: true });
    const path = join(dir, fileName);
    await writeFile(path, content, { flag: 'wx' });
    return path;
  }

  async saveCode(label: string, code: string): Promise<string> {
    const path = await this.writeNew(
      this.codesDir,
      `${this.uniqueSuffix()}_${label}${this.runtime.extension}`,
      code,
    );
    log.debug('Saved code unit', { path, label });
    return path;
  }

  saveCommentary(label: string, text: string): Promise<string> {
    return this.saveCode(label, this.runtime.commentOut(text));
  }

  async storeUpload(fileName: string, bytes: Uint8Array): Promise<string> {
    const stored = `${cleanFileStem(fileName)}_${this.uniqueSuffix()}${extname(fileName).toLowerCase()}`;
    const path = await this.writeNew(this.archiveDir, stored, bytes);
    log.info('Stored upload', { fileName, path });
    return path;
  }

  async archiveDocument(path: string): Promise<string> {
    await mkdir(this.archiveDir, { recursive: true });
    const archived = join(this.archiveDir, `${cleanFileStem(path)}_${this.uniqueSuffix()}${extname(path)}`);
    await copyFile(path, archived);
    log.info('Archived document', { path, archived });
    return archived;
  }
}
