import { OpenProviderClient } from "./client.js";

export {
  DEFAULT_URL,
  DEFAULT_USER_AGENT,
  VERSION,
  OpenProviderClient,
  OpenProviderClientConfig,
} from "./client.js";
export * from "./errors.js";
export * from "./models.js";
export { Response, findReply, readReplyCode } from "./response.js";
export * from "./xml.js";
export { createClientFromEnv, envKey, readEnv } from "./env.js";
export type {
  ClientConfigOptions,
  ClientOptions,
  Credentials,
  ErrorDetails,
  PostRequestHook,
  PreRequestHook,
  RequestHooks,
  XmlContent,
  XmlElement,
} from "./types.js";

export default OpenProviderClient;
