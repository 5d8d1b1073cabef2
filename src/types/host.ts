/**
 * Host metadata captured once per collection run.
 */

export interface ProcessorInfo {
  name: string;
  cores: number | null;
  logicalProcessors: number | null;
  maxClockSpeedMhz: number | null;
}

export interface DiskInfo {
  deviceId: string;
  fileSystem: string;
  sizeBytes: number | null;
  freeSpaceBytes: number | null;
}

export interface HostSnapshot {
  computerName: string;
  osName: string;
  osVersion: string;
  osBuildNumber: string;
  architecture: string;
  manufacturer: string;
  model: string;
  totalMemoryBytes: number | null;
  installDateMs: number | null;
  lastBootTimeMs: number | null;
  /** Hours between last boot and collection time, null when boot time is unknown */
  uptimeHours: number | null;
  processor: ProcessorInfo;
  disks: DiskInfo[];
}
