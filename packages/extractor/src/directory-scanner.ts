import { readdir, stat } from 'fs/promises';
import { join, extname, normalize } from 'path';

export const OFX_EXTENSIONS: readonly string[] = ['.ofx', '.qfx'];

export interface OfxFileInfo {
  filePath: string;
  fileName: string;
  sizeBytes: number;
}

export interface SkippedFile {
  fileName: string;
  reason: string;
}

export interface ScanResult {
  files: OfxFileInfo[];
  skipped: SkippedFile[];
}

export interface ScanOptions {
  /** Lower-case extensions, dot included (default: OFX_EXTENSIONS) */
  extensions?: readonly string[];
}

export type DirectoryCheck = { valid: true } | { valid: false; error: string };

const ACCESS_ERRORS: Record<string, string> = {
  ENOENT: 'Directory does not exist',
  ENOTDIR: 'Path is not a directory',
  EACCES: 'Permission denied',
  EPERM: 'Permission denied',
};

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function skipReasonFor(fileName: string): string | undefined {
  if (fileName.startsWith('~$')) return 'Office lock file';
  if (fileName.startsWith('.')) return 'Hidden file';
  return undefined;
}

/**
 * List the statement files directly inside `directoryPath`, sorted by name.
 *
 * Lock files, hidden files, empty files and entries whose size cannot be read
 * are reported in `skipped` with the reason; subdirectories and other
 * extensions are left out silently.
 */
export async function scanDirectoryForOfx(directoryPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const extensions = options.extensions ?? OFX_EXTENSIONS;
  const root = normalize(directoryPath);
  const entries = await readdir(root, { withFileTypes: true });

  const files: OfxFileInfo[] = [];
  const skipped: SkippedFile[] = [];

  for (const entry of entries) {
    const fileName = entry.name;
    if (entry.isDirectory() || !extensions.includes(extname(fileName).toLowerCase())) {
      continue;
    }

    const reason = skipReasonFor(fileName);
    if (reason !== undefined) {
      skipped.push({ fileName, reason });
      continue;
    }

    const filePath = join(root, fileName);
    let sizeBytes: number;
    try {
      sizeBytes = (await stat(filePath)).size;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      skipped.push({ fileName, reason: `Cannot read file information: ${message}` });
      continue;
    }

    if (sizeBytes === 0) {
      skipped.push({ fileName, reason: 'Zero-byte file' });
      continue;
    }
    files.push({ filePath, fileName, sizeBytes });
  }

  files.sort((a, b) => a.fileName.localeCompare(b.fileName));
  return { files, skipped };
}

export async function validateDirectory(directoryPath: string): Promise<DirectoryCheck> {
  try {
    if (!(await stat(directoryPath)).isDirectory()) {
      return { valid: false, error: `${ACCESS_ERRORS.ENOTDIR}: ${directoryPath}` };
    }
    return { valid: true };
  } catch (error) {
    const code = errorCode(error);
    const known = code !== undefined ? ACCESS_ERRORS[code] : undefined;
    return { valid: false, error: `${known ?? 'Cannot access directory'}: ${directoryPath}` };
  }
}
