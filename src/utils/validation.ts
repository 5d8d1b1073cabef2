/**
 * Event Log Digest - Validation Utilities
 *
 * Zod schemas for data crossing a process boundary: JSON printed by
 * PowerShell and configuration read from flags and the environment.
 *
 * @version 0.1.0
 */

import { z } from 'zod';

// =============================================================================
// COMMON SCHEMAS
// =============================================================================

/**
 * Fields that PowerShell may omit, null out, or render with an unexpected
 * type. A bad value becomes undefined and is judged by the normalizer.
 */
const looseText = z.string().nullish().catch(undefined);
const looseScalar = z.union([z.string(), z.number()]).nullish().catch(undefined);
const looseInteger = z.number().int().nullish().catch(undefined);

// =============================================================================
// POWERSHELL OUTPUT SCHEMAS
// =============================================================================

/**
 * One event row printed by the query script.
 */
export const EventRowSchema = z.object({
  TimeCreated: looseScalar,
  LogName: looseText,
  Level: looseScalar,
  LevelDisplayName: looseText,
  EventID: looseScalar,
  ProviderName: looseText,
  Message: looseText,
  MachineName: looseText,
  ProcessId: looseInteger,
  ThreadId: looseInteger,
});

/**
 * ConvertTo-Json prints a bare object instead of a one-element array in
 * some PowerShell versions.
 */
export const EventRowsOutputSchema = z.union([
  z.array(z.unknown()),
  z.record(z.unknown()).transform((row) => [row]),
]);

/**
 * Host description printed by the host script.
 */
export const HostInfoOutputSchema = z.object({
  ComputerName: looseText,
  OSName: looseText,
  OSVersion: looseText,
  OSBuildNumber: looseScalar,
  OSArchitecture: looseText,
  InstallDate: looseScalar,
  LastBootUpTime: looseScalar,
  Manufacturer: looseText,
  Model: looseText,
  TotalPhysicalMemory: looseInteger,
  Processor: z
    .object({
      Name: looseText,
      NumberOfCores: looseInteger,
      NumberOfLogicalProcessors: looseInteger,
      MaxClockSpeed: looseInteger,
    })
    .nullish()
    .catch(undefined),
  Disks: z
    .array(
      z.object({
        DeviceID: looseText,
        FileSystem: looseText,
        Size: looseInteger,
        FreeSpace: looseInteger,
      })
    )
    .nullish()
    .catch(undefined),
});

export type EventRow = z.infer<typeof EventRowSchema>;
export type HostInfoOutput = z.infer<typeof HostInfoOutputSchema>;

// =============================================================================
// CONFIGURATION SCHEMAS
// =============================================================================

/** Ten years; keeps the window start inside the Date range */
export const MAX_HOURS_BACK = 87600;

/** Largest delay setTimeout and execFile honour; larger values fire after 1 ms */
export const MAX_TIMEOUT_MS = 2147483647;

const positiveInteger = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be positive`);

export const CollectorConfigSchema = z
  .object({
    hoursBack: positiveInteger('hoursBack').max(MAX_HOURS_BACK, `hoursBack must be at most ${MAX_HOURS_BACK}`),
    maxRecords: positiveInteger('maxRecords'),
    outputPath: z.string().min(1, 'outputPath must not be empty'),
    includeSystem: z.boolean(),
    includeApplication: z.boolean(),
    includeSecurity: z.boolean(),
    aggregate: z.boolean(),
    sampleCap: positiveInteger('sampleCap'),
    sourceTimeoutMs: positiveInteger('sourceTimeoutMs').max(
      MAX_TIMEOUT_MS,
      `sourceTimeoutMs must be at most ${MAX_TIMEOUT_MS}`
    ),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  })
  .refine(
    (config) => config.includeSystem || config.includeApplication || config.includeSecurity,
    { message: 'At least one log source must be enabled' }
  );

