/**
 * Event Log Digest - Output Document Schema
 *
 * Zod schema of the JSON document written by a collection run. The event
 * field names (TimeCreated, LogName, Level, EventID, ProviderName, Message)
 * are read by the question-answering layer and must not change.
 */

import { z } from 'zod';
import { LOG_SOURCES } from '../types/eventRecord';
import { parseLevelLabel } from '../pipeline/normalize';

// =============================================================================
// PRIMITIVES
// =============================================================================

export const IsoTimestampSchema = z.string().datetime();

export const LogNameSchema = z.enum(LOG_SOURCES);

export const LevelLabelSchema = z
  .string()
  .refine((label: string) => parseLevelLabel(label) !== null, {
    message: 'Unrecognized level label',
  });

const CountSchema = z.number().int().nonnegative();

// =============================================================================
// EVENTS
// =============================================================================

export const EventEntrySchema = z.object({
  TimeCreated: IsoTimestampSchema,
  LogName: LogNameSchema,
  Level: LevelLabelSchema,
  EventID: z.number().int(),
  ProviderName: z.string(),
  Message: z.string(),
  MachineName: z.string().optional(),
  ProcessId: z.number().int().optional(),
  ThreadId: z.number().int().optional(),
});

export const AggregatedEventEntrySchema = z.object({
  TimeCreated: IsoTimestampSchema,
  LogName: LogNameSchema,
  Level: LevelLabelSchema,
  EventID: z.number().int(),
  ProviderName: z.string(),
  Message: z.string(),
  OccurrenceCount: z.number().int().min(1),
  FirstSeen: IsoTimestampSchema,
  LastSeen: IsoTimestampSchema,
  SampleMessages: z.array(z.string()),
});

export const EventsSchema = z.object({
  System: z.array(z.union([AggregatedEventEntrySchema, EventEntrySchema])),
  Application: z.array(z.union([AggregatedEventEntrySchema, EventEntrySchema])),
  Security: z.array(z.union([AggregatedEventEntrySchema, EventEntrySchema])),
});

// =============================================================================
// SYSTEM INFO
// =============================================================================

export const SystemInfoSchema = z.object({
  OS: z
    .object({
      Caption: z.string(),
      Version: z.string(),
      BuildNumber: z.string(),
      OSArchitecture: z.string(),
      InstallDate: IsoTimestampSchema.nullable(),
      LastBootUpTime: IsoTimestampSchema.nullable(),
      UpTime: z.number().nullable(),
    })
    .optional(),
  Computer: z
    .object({
      Name: z.string(),
      Manufacturer: z.string(),
      Model: z.string(),
      TotalPhysicalMemory: CountSchema.nullable(),
    })
    .optional(),
  Processor: z
    .object({
      Name: z.string(),
      NumberOfCores: CountSchema.nullable(),
      NumberOfLogicalProcessors: CountSchema.nullable(),
      MaxClockSpeed: CountSchema.nullable(),
    })
    .optional(),
  Disks: z
    .array(
      z.object({
        DeviceID: z.string(),
        FileSystem: z.string(),
        Size: CountSchema.nullable(),
        FreeSpace: CountSchema.nullable(),
      })
    )
    .optional(),
});

// =============================================================================
// COLLECTION INFO
// =============================================================================

export const EventCountsSchema = z.object({
  SystemEvents: CountSchema,
  ApplicationEvents: CountSchema,
  SecurityEvents: CountSchema,
  TotalEvents: CountSchema,
});

export const CollectionInfoSchema = z.object({
  CollectionId: z.string().min(1),
  CollectionTime: IsoTimestampSchema,
  Aggregated: z.boolean(),
  TimeRange: z.object({
    StartTime: IsoTimestampSchema,
    EndTime: IsoTimestampSchema,
    HoursBack: z.number().int().positive(),
  }),
  MaxEventsPerLog: z.number().int().positive(),
  EventCounts: EventCountsSchema,
  DroppedRecords: CountSchema,
  Warnings: z.array(z.string()),
});

// =============================================================================
// DOCUMENT
// =============================================================================

type EntryList = z.infer<typeof EventsSchema>['System'];

/**
 * Number of records an event list stands for: its length, or the sum of
 * occurrence counts for aggregated entries.
 */
export function countRecords(entries: EntryList): number {
  return entries.reduce(
    (sum, entry) => sum + ('OccurrenceCount' in entry ? entry.OccurrenceCount : 1),
    0
  );
}

const PER_SOURCE_COUNT_FIELDS = ['SystemEvents', 'ApplicationEvents', 'SecurityEvents'] as const;

export const CollectionDocumentSchema = z
  .object({
    CollectionInfo: CollectionInfoSchema,
    SystemInfo: SystemInfoSchema,
    Events: EventsSchema,
  })
  .superRefine((doc, ctx) => {
    const counts = doc.CollectionInfo.EventCounts;
    const expected = {
      SystemEvents: countRecords(doc.Events.System),
      ApplicationEvents: countRecords(doc.Events.Application),
      SecurityEvents: countRecords(doc.Events.Security),
    };

    for (const field of PER_SOURCE_COUNT_FIELDS) {
      if (counts[field] !== expected[field]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['CollectionInfo', 'EventCounts', field],
          message: `Expected ${expected[field]} to match the event list`,
        });
      }
    }

    const total = expected.SystemEvents + expected.ApplicationEvents + expected.SecurityEvents;
    if (counts.TotalEvents !== total) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CollectionInfo', 'EventCounts', 'TotalEvents'],
        message: `Expected ${total} as the sum of per-source counts`,
      });
    }

    const start = Date.parse(doc.CollectionInfo.TimeRange.StartTime);
    const end = Date.parse(doc.CollectionInfo.TimeRange.EndTime);
    if (start > end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CollectionInfo', 'TimeRange'],
        message: 'StartTime must not be after EndTime',
      });
    }
  });

export type EventEntry = z.infer<typeof EventEntrySchema>;
export type AggregatedEventEntry = z.infer<typeof AggregatedEventEntrySchema>;
export type SystemInfoSection = z.infer<typeof SystemInfoSchema>;
export type CollectionInfoSection = z.infer<typeof CollectionInfoSchema>;
export type CollectionDocument = z.infer<typeof CollectionDocumentSchema>;
