import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

import type { CollectionResult } from '../types/collection';
import {
  CollectionDocumentSchema,
  type CollectionDocument,
} from '../schemas/collectionDocument';
import { errorMessage, OutputWriteError, SerializationError } from '../utils/errors';
import type { LoggerLike } from '../utils/logger';
import { buildCollectionDocument, buildMinimalDocument } from './serialize';

/**
 * Result of writing the output document.
 */
export interface WriteOutcome {
  path: string;
  document: CollectionDocument;
  /** True when the minimal document was written instead of the full one */
  fallback: boolean;
  bytes: number;
}

/**
 * Serialize a document and prove it survives a parse: the parsed value must
 * match the schema and serialize back to the same text.
 *
 * @throws SerializationError
 */
export function serializeDocument(document: CollectionDocument): string {
  const text = JSON.stringify(document, null, 2);

  let reparsed: unknown;
  try {
    reparsed = JSON.parse(text);
  } catch (error) {
    throw new SerializationError(`Serialized document is not valid JSON: ${errorMessage(error)}`);
  }

  const check = CollectionDocumentSchema.safeParse(reparsed);
  if (!check.success) {
    throw new SerializationError('Serialized document does not match the schema', {
      issues: check.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  if (JSON.stringify(reparsed, null, 2) !== text) {
    throw new SerializationError('Serialized document changed after a parse round trip');
  }

  return text;
}

/**
 * Write text to a temporary file beside the target, then rename it over the
 * target. Node writes UTF-8 without a byte-order mark.
 */
export async function writeFileAtomic(
  targetPath: string,
  text: string,
  logger: LoggerLike
): Promise<void> {
  const tempPath = `${targetPath}.${uuidv4()}.tmp`;

  try {
    await fs.promises.writeFile(tempPath, text, { encoding: 'utf8' });
    await fs.promises.rename(tempPath, targetPath);
  } catch (error) {
    try {
      await fs.promises.rm(tempPath, { force: true });
    } catch (cleanupError) {
      logger.warn('Could not remove temporary output file', {
        tempPath,
        error: errorMessage(cleanupError),
      });
    }
    throw new OutputWriteError(targetPath, errorMessage(error));
  }
}

/**
 * Build, validate and atomically write the document for a collection run.
 * Falls back to the minimal document when the full one fails validation.
 *
 * @throws OutputWriteError when nothing valid can be written
 */
export async function writeCollectionDocument(
  outputPath: string,
  result: CollectionResult,
  logger: LoggerLike
): Promise<WriteOutcome> {
  let document: CollectionDocument;
  let text: string;
  let fallback = false;

  try {
    document = buildCollectionDocument(result);
    text = serializeDocument(document);
  } catch (error) {
    const reason = errorMessage(error);
    logger.warn('Full document failed validation, writing minimal document', {
      reason,
      details: error instanceof SerializationError ? error.details : undefined,
    });

    try {
      document = buildMinimalDocument(result, reason);
      text = serializeDocument(document);
    } catch (minimalError) {
      throw new OutputWriteError(
        outputPath,
        `no valid document could be produced (${errorMessage(minimalError)})`
      );
    }
    fallback = true;
  }

  const directory = path.dirname(path.resolve(outputPath));
  try {
    await fs.promises.mkdir(directory, { recursive: true });
  } catch (error) {
    throw new OutputWriteError(outputPath, `cannot create ${directory}: ${errorMessage(error)}`);
  }

  await writeFileAtomic(outputPath, text, logger);

  const bytes = Buffer.byteLength(text, 'utf8');
  logger.info('Collection document written', { path: outputPath, bytes, fallback });

  return { path: outputPath, document, fallback, bytes };
}
