/**
 * Errors Module
 */

export {
  GraphQueryError,
  InvalidQuadError,
  InvalidParameterError,
  QueryFormatError,
  ConfigurationError,
  ConnectionError,
  ExecutionError,
} from './errors'
