/**
 * Target resolution
 *
 * Order: explicit path, then upload, then the remembered last file.
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { LastFileRegistry } from '../../infra/config/index.js';
import type { ArtifactStore } from '../../infra/storage/index.js';
import { DocumentNotFoundError, type TargetSource } from '../models/index.js';
import type { ProcessRequest } from './types.js';

export interface ResolvedTarget {
  path: string;
  source: TargetSource;
  sizeBytes: number;
}

async function fileSize(path: string): Promise<number | null> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : null;
  } catch {
    return null;
  }
}

export async function resolveTarget(
  request: ProcessRequest,
  deps: { store: ArtifactStore; lastFile: LastFileRegistry },
): Promise<ResolvedTarget> {
  if (request.existingFilePath) {
    const path = resolve(request.existingFilePath);
    const size = await fileSize(path);
    if (size === null) {
      throw new DocumentNotFoundError('missing_path', `File not found at path: ${request.existingFilePath}`, path);
    }
    return { path, source: 'existing', sizeBytes: size };
  }

  if (request.upload) {
    const path = await deps.store.storeUpload(request.upload.fileName, request.upload.bytes);
    return { path, source: 'upload', sizeBytes: request.upload.bytes.byteLength };
  }

  const lastPath = deps.lastFile.get();
  if (!lastPath) {
    throw new DocumentNotFoundError('no_input', 'No file provided and no last file found');
  }
  const size = await fileSize(lastPath);
  if (size === null) {
    throw new DocumentNotFoundError('missing_last_file', `Last file not found at path: ${lastPath}`, lastPath);
  }
  return { path: lastPath, source: 'last_file', sizeBytes: size };
}
