/**
 * Event Log Digest - Document Reader Tests
 */

import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { documentToAggregates, parseCollectionDocument, readCollectionDocument } from '../reader';
import { buildCollectionDocument } from '../serialize';
import { serializeDocument } from '../writer';
import { DocumentReadError } from '../../utils/errors';
import {
  createMockCollectionResult,
  createMockEventRecord,
  makeTempDir,
  MINUTE_MS,
  NOW,
  removeTempDir,
} from '../../__tests__/helpers';

const plainDocument = () =>
  buildCollectionDocument(
    createMockCollectionResult({
      events: {
        aggregated: false,
        bySource: {
          System: [],
          Application: [
            createMockEventRecord({ timestampMs: NOW - 40 * MINUTE_MS, message: 'A' }),
            createMockEventRecord({ timestampMs: NOW - 20 * MINUTE_MS, message: 'B' }),
            createMockEventRecord({ timestampMs: NOW - 30 * MINUTE_MS, message: 'A' }),
          ],
          Security: [],
        },
      },
    })
  );

// =============================================================================
// PARSING
// =============================================================================

describe('parseCollectionDocument', () => {
  it('should tolerate a leading byte-order mark', () => {
    const document = plainDocument();
    expect(parseCollectionDocument('\uFEFF' + serializeDocument(document))).toEqual(document);
  });

  it('should reject empty text', () => {
    expect(() => parseCollectionDocument('  \n')).toThrow(new DocumentReadError('<input>', 'Log file is empty'));
  });

  it('should reject invalid JSON', () => {
    expect(() => parseCollectionDocument('{"CollectionInfo":', 'eventlog.json')).toThrow(
      /^Invalid JSON \(.*\): eventlog\.json$/
    );
  });

  it('should name the first schema problem', () => {
    expect(() => parseCollectionDocument('{"CollectionInfo": {}}')).toThrow(
      new DocumentReadError('<input>', 'Unexpected document shape (CollectionInfo.CollectionId: Required)')
    );
  });
});

describe('readCollectionDocument', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should report a missing file', async () => {
    const missing = path.join(dir, 'missing.json');

    await expect(readCollectionDocument(missing)).rejects.toThrow(
      new DocumentReadError(missing, 'Log file not found')
    );
  });

  it('should read a document written with a BOM', async () => {
    const file = path.join(dir, 'eventlog.json');
    await fs.promises.writeFile(file, '\uFEFF' + serializeDocument(plainDocument()), 'utf8');

    const document = await readCollectionDocument(file);

    expect(document.CollectionInfo.EventCounts.ApplicationEvents).toBe(3);
  });
});

// =============================================================================
// AGGREGATED VIEW
// =============================================================================

describe('documentToAggregates', () => {
  it('should fold plain documents', () => {
    const bySource = documentToAggregates(plainDocument());

    expect(bySource.System).toEqual([]);
    expect(bySource.Application).toEqual([
      {
        logSource: 'Application',
        providerName: 'MyApp',
        eventId: 1000,
        level: { kind: 'Error' },
        occurrenceCount: 3,
        firstSeenMs: NOW - 40 * MINUTE_MS,
        lastSeenMs: NOW - 20 * MINUTE_MS,
        sampleMessages: ['A', 'B'],
      },
    ]);
  });

  it('should read aggregated documents as they are', () => {
    const aggregated = documentToAggregates(plainDocument());
    const document = buildCollectionDocument(
      createMockCollectionResult({ events: { aggregated: true, bySource: aggregated } })
    );

    expect(documentToAggregates(parseCollectionDocument(serializeDocument(document)))).toEqual(aggregated);
  });
});
