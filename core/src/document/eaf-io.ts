import { readFile, writeFile } from 'node:fs/promises';
import { createDocumentError, DocumentErrorCode, isTierlineError } from '../errors/index.js';
import { parseEaf } from './eaf-parser.js';
import { serializeEaf } from './eaf-writer.js';
import type { AnnotationDocument } from './types.js';

export async function loadEaf(filePath: string): Promise<AnnotationDocument> {
  let xml: string;
  try {
    xml = await readFile(filePath, 'utf8');
  } catch (error) {
    throw createDocumentError(
      DocumentErrorCode.FILE_LOAD_FAILED,
      `Failed to read annotation document: ${error instanceof Error ? error.message : String(error)}`,
      { filePath, cause: error },
    );
  }
  return parseEaf(xml, filePath);
}

/**
 * Render `doc` and write it to `filePath`. The text is rendered in full before
 * the file is opened, so a rendering failure leaves no file behind.
 */
export async function saveEaf(filePath: string, doc: AnnotationDocument): Promise<void> {
  let xml: string;
  try {
    xml = serializeEaf(doc);
  } catch (error) {
    if (isTierlineError(error)) {
      throw error;
    }
    throw createDocumentError(
      DocumentErrorCode.RENDER_FAILED,
      `Failed to render annotation document: ${error instanceof Error ? error.message : String(error)}`,
      { filePath, cause: error },
    );
  }

  try {
    await writeFile(filePath, xml, 'utf8');
  } catch (error) {
    throw createDocumentError(
      DocumentErrorCode.FILE_WRITE_FAILED,
      `Failed to write annotation document: ${error instanceof Error ? error.message : String(error)}`,
      { filePath, cause: error },
    );
  }
}
