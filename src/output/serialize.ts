import type { CollectionResult } from '../types/collection';
import type { AggregatedEvent, EventRecord, LogSource } from '../types/eventRecord';
import type { HostSnapshot } from '../types/host';
import type {
  AggregatedEventEntry,
  CollectionDocument,
  CollectionInfoSection,
  EventEntry,
  SystemInfoSection,
} from '../schemas/collectionDocument';
import { levelLabel } from '../pipeline/normalize';
import { toIsoUtc } from '../utils/time';

/**
 * Document form of one normalized record.
 */
export function toEventEntry(record: EventRecord): EventEntry {
  const entry: EventEntry = {
    TimeCreated: toIsoUtc(record.timestampMs),
    LogName: record.logSource,
    Level: levelLabel(record.level),
    EventID: record.eventId,
    ProviderName: record.providerName,
    Message: record.message,
  };

  if (record.machineName !== undefined) entry.MachineName = record.machineName;
  if (record.processId !== undefined) entry.ProcessId = record.processId;
  if (record.threadId !== undefined) entry.ThreadId = record.threadId;

  return entry;
}

/**
 * Document form of one aggregated group. TimeCreated and Message carry the
 * most recent time and the first sample so consumers that read plain events
 * keep working.
 */
export function toAggregatedEntry(event: AggregatedEvent): AggregatedEventEntry {
  return {
    TimeCreated: toIsoUtc(event.lastSeenMs),
    LogName: event.logSource,
    Level: levelLabel(event.level),
    EventID: event.eventId,
    ProviderName: event.providerName,
    Message: event.sampleMessages[0] ?? '',
    OccurrenceCount: event.occurrenceCount,
    FirstSeen: toIsoUtc(event.firstSeenMs),
    LastSeen: toIsoUtc(event.lastSeenMs),
    SampleMessages: [...event.sampleMessages],
  };
}

function optionalIso(ms: number | null): string | null {
  return ms === null ? null : toIsoUtc(ms);
}

/**
 * Host snapshot in the section layout the question-answering layer reads.
 */
export function toSystemInfo(host: HostSnapshot): SystemInfoSection {
  return {
    OS: {
      Caption: host.osName,
      Version: host.osVersion,
      BuildNumber: host.osBuildNumber,
      OSArchitecture: host.architecture,
      InstallDate: optionalIso(host.installDateMs),
      LastBootUpTime: optionalIso(host.lastBootTimeMs),
      UpTime: host.uptimeHours,
    },
    Computer: {
      Name: host.computerName,
      Manufacturer: host.manufacturer,
      Model: host.model,
      TotalPhysicalMemory: host.totalMemoryBytes,
    },
    Processor: {
      Name: host.processor.name,
      NumberOfCores: host.processor.cores,
      NumberOfLogicalProcessors: host.processor.logicalProcessors,
      MaxClockSpeed: host.processor.maxClockSpeedMhz,
    },
    Disks: host.disks.map((disk) => ({
      DeviceID: disk.deviceId,
      FileSystem: disk.fileSystem,
      Size: disk.sizeBytes,
      FreeSpace: disk.freeSpaceBytes,
    })),
  };
}

function collectionInfo(
  result: CollectionResult,
  counts: Record<LogSource, number>
): CollectionInfoSection {
  return {
    CollectionId: result.collectionId,
    CollectionTime: toIsoUtc(result.collectionTimeMs),
    Aggregated: result.events.aggregated,
    TimeRange: {
      StartTime: toIsoUtc(result.windowStartMs),
      EndTime: toIsoUtc(result.windowEndMs),
      HoursBack: result.hoursBack,
    },
    MaxEventsPerLog: result.maxRecords,
    EventCounts: {
      SystemEvents: counts.System,
      ApplicationEvents: counts.Application,
      SecurityEvents: counts.Security,
      TotalEvents: counts.System + counts.Application + counts.Security,
    },
    DroppedRecords: result.droppedRecords,
    Warnings: [...result.warnings],
  };
}

function sumOccurrences(events: readonly AggregatedEvent[]): number {
  return events.reduce((sum, event) => sum + event.occurrenceCount, 0);
}

/**
 * Assemble the output document for a collection run.
 */
export function buildCollectionDocument(result: CollectionResult): CollectionDocument {
  const events = result.events;

  if (events.aggregated) {
    const { System, Application, Security } = events.bySource;
    return {
      CollectionInfo: collectionInfo(result, {
        System: sumOccurrences(System),
        Application: sumOccurrences(Application),
        Security: sumOccurrences(Security),
      }),
      SystemInfo: toSystemInfo(result.host),
      Events: {
        System: System.map(toAggregatedEntry),
        Application: Application.map(toAggregatedEntry),
        Security: Security.map(toAggregatedEntry),
      },
    };
  }

  const { System, Application, Security } = events.bySource;
  return {
    CollectionInfo: collectionInfo(result, {
      System: System.length,
      Application: Application.length,
      Security: Security.length,
    }),
    SystemInfo: toSystemInfo(result.host),
    Events: {
      System: System.map(toEventEntry),
      Application: Application.map(toEventEntry),
      Security: Security.map(toEventEntry),
    },
  };
}

/**
 * Document with collection metadata only: empty host section and event lists.
 * Written when the full document cannot be produced.
 */
export function buildMinimalDocument(
  result: CollectionResult,
  reason: string
): CollectionDocument {
  const info = collectionInfo(result, { System: 0, Application: 0, Security: 0 });
  return {
    CollectionInfo: {
      ...info,
      Warnings: [...info.Warnings, `Event data omitted: ${reason}`],
    },
    SystemInfo: {},
    Events: {
      System: [],
      Application: [],
      Security: [],
    },
  };
}
