export { formatEth, formatGasPrice, toJson } from './format'
export {
  clearLoggerCache,
  createLogger,
  getLogger,
  type LogLevel,
  LogLevelSchema,
  type Logger,
  type LoggerConfig,
  resolveLogLevel,
} from './logger'
export {
  AddressSchema,
  formatIssues,
  HashSchema,
  HexBytesSchema,
  HexSchema,
  QuantitySchema,
  RpcUrlSchema,
  validate,
} from './validation'
