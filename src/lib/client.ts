import { Agent as HttpsAgent } from "node:https";
import axios from "axios";
import type { AxiosInstance, AxiosResponse } from "axios";

import {
  ConfigurationError,
  MalformedResponse,
  ServiceUnavailable,
  formatApiErrorMessage,
  normalizeError,
  resolveErrorKind,
} from "./errors.js";
import { Response, findReply, readReplyCode } from "./response.js";
import {
  ClientConfigOptionsSchema,
  validateSchema,
} from "./types.js";
import type {
  ClientConfigOptions,
  ClientOptions,
  Credentials,
  RequestHooks,
  XmlElement,
} from "./types.js";
import {
  findChild,
  parseResponse,
  renderEnvelope,
  textContent,
  validateCredentials,
} from "./xml.js";

export const DEFAULT_URL = "https://api.openprovider.eu";
export const VERSION = "0.1.0";
export const DEFAULT_USER_AGENT = `openprovider-client/${VERSION}`;

export class OpenProviderClientConfig {
  url: string;
  timeout: number;
  rejectUnauthorized: boolean;
  userAgent: string;

  constructor({
    url = DEFAULT_URL,
    timeout = 60000,
    rejectUnauthorized = true,
    userAgent = DEFAULT_USER_AGENT,
  }: ClientConfigOptions = {}) {
    this.url = url;
    this.timeout = timeout;
    this.rejectUnauthorized = rejectUnauthorized;
    this.userAgent = userAgent;
  }

  clone(overrides: Partial<ClientConfigOptions> = {}): OpenProviderClientConfig {
    return new OpenProviderClientConfig({
      url: overrides.url ?? this.url,
      timeout: overrides.timeout ?? this.timeout,
      rejectUnauthorized: overrides.rejectUnauthorized ?? this.rejectUnauthorized,
      userAgent: overrides.userAgent ?? this.userAgent,
    });
  }

  validate(): Error | null {
    return validateSchema(
      ClientConfigOptionsSchema,
      {
        url: this.url,
        timeout: this.timeout,
        rejectUnauthorized: this.rejectUnauthorized,
        userAgent: this.userAgent,
      },
      "Client configuration validation failed"
    );
  }
}

export class OpenProviderClient {
  private readonly _credentials: Readonly<Credentials>;
  private readonly _config: OpenProviderClientConfig;
  private readonly _hooks: Readonly<RequestHooks>;
  private readonly _http: AxiosInstance;
  private readonly _httpsAgent: HttpsAgent;

  constructor({
    username,
    password,
    passwordHash,
    hooks = {},
    http,
    ...configOptions
  }: ClientOptions) {
    const credentials: Credentials = { username, password, passwordHash };
    const credentialError = validateCredentials(credentials);

    if (credentialError) {
      throw new ConfigurationError(credentialError.message);
    }

    const config = new OpenProviderClientConfig(configOptions);
    const configError = config.validate();

    if (configError) {
      throw new ConfigurationError(configError.message);
    }

    this._credentials = Object.freeze(credentials);
    this._config = config;
    this._hooks = Object.freeze({ ...hooks });
    this._http = http ?? axios.create();
    this._httpsAgent = new HttpsAgent({
      rejectUnauthorized: config.rejectUnauthorized,
    });
  }

  get username(): string {
    return this._credentials.username;
  }

  get config(): OpenProviderClientConfig {
    return this._config;
  }

  /**
   * Wraps `payload` in the credential envelope, posts it and returns the
   * reply. A non-zero reply code is thrown as the error kind mapped to it.
   */
  async request(payload: XmlElement): Promise<Response> {
    const envelope = renderEnvelope(this._credentials, payload);
    this._hooks.preRequest?.(payload, envelope);

    const httpResponse = await this._post(envelope);
    const tree = await parseResponse(httpResponse.data);
    this._hooks.postRequest?.(httpResponse, tree);

    const code = readReplyCode(tree);

    if (code === 0) {
      return new Response(tree);
    }

    const reply = findReply(tree);
    const description = textContent(findChild(reply, "desc"));
    const data = textContent(findChild(reply, "data"));
    const ErrorKind = resolveErrorKind(code);

    throw new ErrorKind(formatApiErrorMessage(description, code, data), {
      code,
      description,
      data,
    });
  }

  // ========================================
  // INTERNAL METHODS
  // ========================================

  private async _post(envelope: string): Promise<AxiosResponse<string>> {
    let response: AxiosResponse<unknown>;

    try {
      response = await this._http.post<unknown>(this._config.url, envelope, {
        headers: {
          "Content-Type": "text/xml; charset=utf-8",
          "User-Agent": this._config.userAgent,
        },
        httpsAgent: this._httpsAgent,
        responseType: "text",
        timeout: this._config.timeout,
        validateStatus: () => true,
      });
    } catch (error) {
      throw new ServiceUnavailable(normalizeError(error, "Request failed.").message, {
        cause: error,
      });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new ServiceUnavailable(
        `Request failed with status code ${response.status}`
      );
    }

    if (typeof response.data !== "string") {
      throw new MalformedResponse("The response body is not text.");
    }

    return { ...response, data: response.data };
  }
}
