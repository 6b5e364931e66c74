/**
 * Oracle abstraction: anything that turns a prompt into text.
 */

/** A file sent alongside a prompt */
export interface OracleFile {
  /** Label the prompt refers to, e.g. `original_file` */
  label: string;
  fileName: string;
  bytes: Uint8Array;
  /** Extracted text of the file, sent ahead of its bytes */
  text?: string;
}

export interface GenerateOptions {
  files?: OracleFile[];
  stream?: boolean;
}

export interface Oracle {
  readonly name: string;
  /**
   * Generate text for a prompt.
   * @throws OracleError on transport failures or policy blocks
   * @throws EmptyOracleResponseError when no text came back
   */
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}
