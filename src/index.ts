export {
    SessionError,
    ConnectError,
    ReadError,
    WriteError,
    ClosedError,
    StateError,
    FramingError,
    ConfigError,
    isSessionError,
    type SessionErrorCode,
} from "./errors.js";
export { encodeLine, LineDecoder, DEFAULT_MAX_LINE_LENGTH } from "./framing.js";
export { Connection, DEFAULT_CONNECT_TIMEOUT_MS, type DialOptions } from "./connection.js";
export {
    LineReader,
    type LineReaderOptions,
    type MessageHandler,
    type EndHandler,
} from "./line-reader.js";
export { LineWriter } from "./line-writer.js";
export {
    Session,
    DEFAULT_HOST,
    DEFAULT_PORT,
    type SessionOptions,
    type SessionState,
} from "./session.js";
export { LineServer, type LineServerOptions } from "./server.js";
export {
    resolveConfig,
    ClientConfigSchema,
    type ClientConfig,
    type ClientConfigInput,
} from "./config.js";
export { createLogger, rootLogger, setLogLevel, type Logger, type LogLevel } from "./logger.js";
export { runClient, type ClientIO } from "./cli.js";
