import type { LastFileRegistry } from '../../infra/config/index.js';
import type { ProcessingResult } from '../models/index.js';
import type { ValidationCycleDeps } from '../correction/index.js';

/** Receives every finished result (history, audit) */
export interface ResultRecorder {
  record(result: ProcessingResult): void | Promise<void>;
}

export interface UploadedFile {
  fileName: string;
  bytes: Uint8Array;
}

export interface ProcessRequest {
  task: string;
  /** Document to modify in place; takes precedence over an upload */
  existingFilePath?: string;
  upload?: UploadedFile;
}

export interface ProcessOptions {
  /** Attach the resulting document's bytes to the result */
  returnFile?: boolean;
}

export interface OrchestratorDeps extends ValidationCycleDeps {
  lastFile: LastFileRegistry;
  recorder?: ResultRecorder;
  codesDir: string;
  clock?: () => number;
}
