/**
 * Loads DICOM files from a folder tree for the send command
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { errorMessage } from '../../errors.js';
import { DicomObject, DicomObjectCodec } from '../../dicom/DicomObjectCodec.js';

export interface LoadedFolder {
  objects: DicomObject[];
  files: string[];
  skipped: Array<{ file: string; reason: string }>;
}

/**
 * Every regular file under `root`, depth first, sorted by name
 */
export async function listFiles(root: string): Promise<string[]> {
  const entries = await fs.readdir(root, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(root, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}

/**
 * Read every file as a DICOM object. Files that are not readable DICOM
 * (no SOP class, instance or transfer syntax) are skipped with a reason.
 */
export async function loadFolder(root: string): Promise<LoadedFolder> {
  const codec = new DicomObjectCodec();
  const result: LoadedFolder = { objects: [], files: [], skipped: [] };
  for (const file of await listFiles(root)) {
    try {
      result.objects.push(codec.toObject(await fs.readFile(file)));
      result.files.push(file);
    } catch (error) {
      result.skipped.push({ file, reason: errorMessage(error) });
    }
  }
  return result;
}
