export {
  LOG_LEVELS,
  flushLoggers,
  getLogger,
  initLogger,
  isLogLevel,
  type LogEntry,
  type LogLevel,
  type Logger,
  type LoggerConfig,
  type Sink,
} from './logger.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export { FileSink, type FileSinkOptions } from './sinks/file.js';
