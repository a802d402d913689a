export { createLogger, logger, LogLevels, setLogLevel } from './logger'
