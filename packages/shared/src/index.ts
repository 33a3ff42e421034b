// Types
export type {
  MetricType,
  Labels,
  Metric,
  CollectorStatus,
  Snapshot,
  CollectorName,
  RaidState,
  LogLevel,
  ToolConfig,
  ExporterConfig,
} from './types/index.js';

export { COLLECTOR_NAMES, RAID_STATE_CODES } from './types/index.js';

// Constants
export {
  EXPORTER_VERSION,
  DEFAULT_ADDRESS,
  DEFAULT_PORT,
  DEFAULT_METRICS_PATH,
  DEFAULT_TOOL_TIMEOUT,
  DEFAULT_COLLECTOR_TIMEOUT,
  DEFAULT_KILL_GRACE,
  DEFAULT_MAX_OUTPUT,
  DEFAULT_SEL_LIMIT,
  DEFAULT_SMARTCTL_PATH,
  DEFAULT_MEGACLI_PATH,
  DEFAULT_PERCCLI_PATH,
  DEFAULT_IPMITOOL_PATH,
  DEFAULT_TEXTFILE_PATH,
  EXPOSITION_CONTENT_TYPE,
  EXPORTER_METRIC_PREFIX,
} from './constants.js';

// Schemas
export {
  exporterEnvSchema,
  booleanFlagSchema,
  durationSchema,
  MAX_TIMER_MS,
  byteSizeSchema,
  portSchema,
} from './schemas/config.schema.js';

export type { ExporterEnvInput, ValidatedExporterEnv } from './schemas/config.schema.js';

// Utilities
export { parseDuration, formatDuration, parseBytes, parseBooleanFlag } from './utils/parser.js';

export { loadConfig } from './utils/config.js';

export { createLogger, getLogger, setDefaultLogger, setLogLevel } from './utils/logger.js';
export type { CreateLoggerOptions } from './utils/logger.js';

export {
  ExporterError,
  ConfigurationError,
  ToolInvocationError,
  ToolTimeoutError,
  ToolSpawnError,
  ToolOutputLimitError,
  ParseError,
  CollectorError,
  CollectorTimeoutError,
  ServerStartError,
} from './utils/errors.js';
