export {
  type AuthFailure,
  type AuthOutcome,
  type Credentials,
  type ParsedAuthorization,
  authenticate,
  parseBasicAuth,
} from './auth';
export {
  ConfigError,
  type LogLevel,
  type ServerConfig,
  type UserCredentials,
  loadConfig,
} from './config';
export { type ServerOptions, createServer } from './server';
