export { LOG_PATH_ENV_VAR, TelemetryLogger, type TelemetryLoggerOptions } from './telemetry-logger.js';
