/**
 * Public API of the device command runner.
 */

export * from '@shared/types';
export { DEVICE_TYPES, REQUIRED_COLUMNS, DEFAULT_SSH_PORT, isDeviceType } from '@shared/constants';

export {
  RunnerError,
  ValidationError,
  TransportError,
  CancelledError,
  RunFaultError,
  errorMessage,
} from './errors';
export type { ValidationErrorCode, TransportErrorKind } from './errors';

export { resolveRunSettings, loadRunSettings } from './config/settings';
export {
  RunSettingsSchema,
  RunSettingsUpdateSchema,
  DeviceRowSchema,
  JobFileSchema,
  validateInput,
} from './config/schemas';
export type { JobFile, OutputFormat } from './config/schemas';

export { CommandRunner, RunHandle } from './services/execution/CommandRunner';
export type { CommandRunnerOptions, RunJob } from './services/execution/CommandRunner';
export { RunEmitter } from './services/execution/RunEmitter';
export { RunContext } from './services/execution/RunContext';
export { FailureClassifier } from './services/execution/FailureClassifier';
export type { FailureClassification, SessionPhase } from './services/execution/FailureClassifier';

export { buildDeviceList, buildExecutionUnits, splitCommands } from './services/devices/DeviceTable';
export { DEVICE_DRIVERS, resolveDeviceDriver, isErrorOutput } from './services/devices/deviceDrivers';
export type { DeviceDriver } from './services/devices/deviceDrivers';

export {
  CredentialResolver,
  EnvCredentialProvider,
  InMemoryCredentialProvider,
} from './services/security/CredentialResolver';
export type { CredentialProvider } from './services/security/CredentialResolver';

export type {
  ConnectOptions,
  ConnectTarget,
  OperationOptions,
  Transport,
  TransportSession,
} from './services/transport/Transport';
export { SSHTransport } from './services/ssh/SSHTransport';
export type { SSHTransportOptions } from './services/ssh/SSHTransport';

export {
  toRows,
  toExportRows,
  toCsv,
  toText,
  toJson,
  writeReport,
  buildOutputFileName,
  sanitizeFileName,
} from './services/export/ReportExporter';
export type { ExportRow, ReportRow } from './services/export/ReportExporter';

export { sanitizeForLog } from './utils/sanitize';
export { createLogger, setLogLevel } from './utils/logger';
export type { Logger } from './utils/logger';
