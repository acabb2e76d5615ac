import { readFile } from 'fs/promises';
import { extractOfx, type ExtractOptions, type ExtractionResult } from './extract.js';
import type { OfxFileInfo } from './directory-scanner.js';

export interface FileError {
  fileName: string;
  filePath: string;
  error: string;
  timestamp: string;
}

export interface FileExtraction {
  file: OfxFileInfo;
  /** Bytes as read from disk, before decoding */
  raw: Buffer;
  result: ExtractionResult;
}

export interface BatchProcessResult {
  extractions: FileExtraction[];
  errors: FileError[];
  summary: {
    filesFound: number;
    filesSucceeded: number;
    filesFailed: number;
    totalRows: number;
  };
}

export interface BatchProcessOptions extends ExtractOptions {
  onProgress?: (current: number, total: number, fileName: string) => void;
  onError?: (error: FileError) => void;
}

function createFileError(file: OfxFileInfo, message: string): FileError {
  return {
    fileName: file.fileName,
    filePath: file.filePath,
    error: message,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Extracts every file in turn. A file that cannot be read or whose OFX does not
 * parse is recorded as an error; the remaining files are still processed.
 */
export async function processBatch(
  files: readonly OfxFileInfo[],
  options: BatchProcessOptions
): Promise<BatchProcessResult> {
  const extractions: FileExtraction[] = [];
  const errors: FileError[] = [];
  let totalRows = 0;

  for (const [index, file] of files.entries()) {
    options.onProgress?.(index + 1, files.length, file.fileName);

    let raw: Buffer;
    try {
      raw = await readFile(file.filePath);
    } catch (error) {
      const fileError = createFileError(file, error instanceof Error ? error.message : String(error));
      errors.push(fileError);
      options.onError?.(fileError);
      continue;
    }

    const result = extractOfx(raw, options);
    extractions.push({ file, raw, result });

    if (result.ok) {
      totalRows += result.rows.length;
    } else {
      const fileError = createFileError(file, result.error);
      errors.push(fileError);
      options.onError?.(fileError);
    }
  }

  return {
    extractions,
    errors,
    summary: {
      filesFound: files.length,
      filesSucceeded: files.length - errors.length,
      filesFailed: errors.length,
      totalRows,
    },
  };
}
