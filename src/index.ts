/**
 * tracksmith - typed configuration for embedded genome browsers
 *
 * Build validated track and browser configurations from loose data, resolve
 * each track's variant from its type hint or file format, and rewrite local
 * files into URLs the renderer can fetch.
 */

// Configuration building and serving
export * from "./config";
// Error types
export {
  ConfigurationError,
  FileNotFoundError,
  ResourceProviderError,
  SchemaViolationError,
  TracksmithError,
  UnknownTrackTypeError,
} from "./errors";
// Promise adapters for Effect programs
export { runOnRuntime, runToPromise, runWithLayer } from "./io/runtime";
// Resource providers
export * from "./resources";
// Scripting session
export { type Locus, Session, type SessionOptions, type TrackArgument } from "./session";
// Track variants
export * from "./tracks";
