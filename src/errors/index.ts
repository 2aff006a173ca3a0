export { ChatStreamError } from './error.js';
export {
  MissingCredentialError,
  ConfigurationError,
  TransportError,
  DecodeError,
} from './categories.js';
