export const EXPORTER_VERSION = '1.0.0';

export const DEFAULT_ADDRESS = '0.0.0.0';
export const DEFAULT_PORT = 8101;
export const DEFAULT_METRICS_PATH = '/metrics';

export const DEFAULT_TOOL_TIMEOUT = '30s';
export const DEFAULT_COLLECTOR_TIMEOUT = '60s';
export const DEFAULT_KILL_GRACE = '2s';
export const DEFAULT_MAX_OUTPUT = '16MB';
export const DEFAULT_SEL_LIMIT = 100;

export const DEFAULT_SMARTCTL_PATH = 'smartctl';
export const DEFAULT_MEGACLI_PATH = '/opt/MegaRAID/MegaCli/MegaCli64';
export const DEFAULT_PERCCLI_PATH = '/usr/bin/perccli64';
export const DEFAULT_IPMITOOL_PATH = 'ipmitool';

export const DEFAULT_TEXTFILE_PATH = '/tmp/metrics/disk_exporter.prom';

export const EXPOSITION_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';
export const EXPORTER_METRIC_PREFIX = 'disk_exporter_';
