/**
 * Object Store Access
 *
 * Raw documents live on a shared volume; `raw_uri` is a file:// URI or a
 * path relative to the object store root.
 */

import fs from 'fs/promises';
import path from 'path';

export function resolveRawUri(rawUri: string, objectStorePath: string): string {
  const filePath = rawUri.startsWith('file://') ? rawUri.slice('file://'.length) : rawUri;
  return path.isAbsolute(filePath) ? filePath : path.join(objectStorePath, filePath);
}

export async function readRawDocument(rawUri: string, objectStorePath: string): Promise<Buffer> {
  return fs.readFile(resolveRawUri(rawUri, objectStorePath));
}

/**
 * Copy a local file into the object store under `<documentId><ext>`.
 * @returns the file:// URI of the stored copy
 */
export async function storeRawDocument(
  sourcePath: string,
  documentId: string,
  objectStorePath: string
): Promise<string> {
  await fs.mkdir(objectStorePath, { recursive: true });
  const target = path.join(objectStorePath, `${documentId}${path.extname(sourcePath).toLowerCase()}`);
  await fs.copyFile(sourcePath, target);
  return `file://${target}`;
}
