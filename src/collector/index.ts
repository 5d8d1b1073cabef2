/**
 * Event Log Digest - Collector Module
 *
 * @version 0.1.0
 */

export type { EventSource, HostInfoProvider } from './eventSource';

export {
  type CollectorOptions,
  type CollectRequest,
  type RawCollection,
  DEFAULT_SOURCE_TIMEOUT_MS,
  EventCollector,
  selectWindow,
  unknownHostSnapshot,
} from './collector';

export {
  type CommandResult,
  type CommandRunner,
  type PowerShellSourceOptions,
  execFileRunner,
  encodeScriptArgs,
  parseEventRows,
  parseHostInfo,
  PowerShellEventSource,
} from './powershell';

export {
  type CollectorConfig,
  type LoadConfigOptions,
  type ValidationResult,
  DEFAULT_COLLECTOR_CONFIG,
  defaultOutputPath,
  loadCollectorConfig,
  validateCollectorConfig,
  assertValidConfig,
  enabledSources,
  getLoggableConfig,
} from './config';
