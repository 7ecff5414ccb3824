/**
 * Resource resolution and the bundled local file server
 */

export {
  DEFAULT_SERVER_OPTIONS,
  LocalFileServer,
  loadServerOptionsFromEnv,
  resolveServerOptions,
  type ServerOptions,
} from "./local-server";
export { isHref, resolveFileOrUrl } from "./resolver";
export {
  createRegistry,
  type Resource,
  ResourceProvider,
  type ResourceProviderShape,
  ResourceRegistry,
  type ResourceRegistryShape,
} from "./service";
