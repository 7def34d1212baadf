import axios from "axios";
import type { AxiosInstance, AxiosResponse } from "axios";
import { Injectable } from "@nestjs/common";

import { BaseService } from "@/common/base";
import { errorMessage, isPlainObject } from "@/common/utils/common.utils";
import type { TelemetryPayload } from "@/telemetry/telemetry.types";
import { decodeJwtExpiry } from "./jwt.utils";
import { UpstreamAuthenticationError } from "./upstream.errors";
import type {
  AttributePayload,
  AttributeScope,
  TokenPair,
  UploadAck,
  UploadOptions,
  UploadResult,
  UpstreamClientConfig,
  UpstreamFailure,
  UpstreamTelemetryClient,
} from "./upstream.types";

const LOGIN_PATH = "/api/auth/login";
const REFRESH_PATH = "/api/auth/token";
const TOKEN_REFRESH_MARGIN_MS = 30 * 1000;
const FALLBACK_TOKEN_LIFETIME_MS = 2.5 * 60 * 60 * 1000;
const MAX_BODY_LENGTH = 500;

/**
 * REST client for the telemetry platform.
 *
 * Holds one JWT for the whole process. Token acquisition is single-flight:
 * concurrent uploads that find no valid token share one login. An upload that
 * gets a 401 drops the token and retries once.
 */
@Injectable()
export class HttpUpstreamTelemetryClient extends BaseService implements UpstreamTelemetryClient {
  private readonly http: AxiosInstance;
  private tokens?: TokenPair;
  private tokenExpiresAt = 0;
  private pendingToken?: Promise<string>;

  constructor(private readonly config: UpstreamClientConfig) {
    super();
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: { "Content-Type": "application/json" },
      // Statuses are mapped to UploadResult below; only transport errors reject
      validateStatus: () => true,
    });
  }

  async upload(targetId: string, payload: TelemetryPayload, options: UploadOptions = {}): Promise<UploadResult> {
    return this.send(`${this.devicePath(targetId)}/timeseries/any`, targetId, payload, options.signal, {
      acceptedKeys: Object.keys(payload),
      acceptedCount: Object.values(payload).reduce((total, samples) => total + samples.length, 0),
    });
  }

  async uploadAttributes(
    targetId: string,
    scope: AttributeScope,
    attributes: AttributePayload,
    options: UploadOptions = {}
  ): Promise<UploadResult> {
    const keys = Object.keys(attributes);
    return this.send(`${this.devicePath(targetId)}/attributes/${scope}`, targetId, attributes, options.signal, {
      acceptedKeys: keys,
      acceptedCount: keys.length,
    });
  }

  activeSecrets(): string[] {
    return this.tokens ? [this.tokens.token, this.tokens.refreshToken].filter(Boolean) : [];
  }

  /**
   * Current access token, logging in or refreshing when it is missing or about to expire
   */
  async getAccessToken(): Promise<string> {
    if (this.tokens && Date.now() < this.tokenExpiresAt) {
      return this.tokens.token;
    }

    if (!this.pendingToken) {
      this.pendingToken = this.acquireToken().finally(() => {
        this.pendingToken = undefined;
      });
    }
    return this.pendingToken;
  }

  invalidateToken(): void {
    this.tokenExpiresAt = 0;
  }

  private devicePath(targetId: string): string {
    return `/api/plugins/telemetry/DEVICE/${encodeURIComponent(targetId)}`;
  }

  /**
   * POST with the current token, retrying once with a fresh one on 401
   */
  private async send(
    path: string,
    targetId: string,
    body: object,
    signal: AbortSignal | undefined,
    ack: UploadAck
  ): Promise<UploadResult> {
    try {
      let response = await this.authorizedPost(path, body, signal);
      if (response.status === 401) {
        this.logDebug(`Token rejected while uploading for ${targetId}, re-authenticating`, "Auth");
        this.invalidateToken();
        response = await this.authorizedPost(path, body, signal);
      }

      if (response.status >= 200 && response.status < 300) {
        return { ok: true, ack };
      }

      return {
        ok: false,
        failure: {
          statusCode: response.status,
          message: `Upstream responded with status ${response.status}`,
          body: this.bodyText(response.data),
        },
      };
    } catch (error) {
      return { ok: false, failure: this.describeError(error) };
    }
  }

  private async authorizedPost(
    path: string,
    body: object,
    signal: AbortSignal | undefined
  ): Promise<AxiosResponse<unknown>> {
    const token = await this.getAccessToken();
    return this.http.post<unknown>(path, body, {
      headers: { "X-Authorization": `Bearer ${token}` },
      signal,
    });
  }

  private async acquireToken(): Promise<string> {
    if (this.tokens?.refreshToken) {
      try {
        return await this.requestToken(REFRESH_PATH, { refreshToken: this.tokens.refreshToken });
      } catch (error) {
        this.logWarning(`Token refresh failed, logging in again: ${errorMessage(error)}`, "Auth");
      }
    }

    return this.requestToken(LOGIN_PATH, { username: this.config.username, password: this.config.password });
  }

  private async requestToken(path: string, body: Record<string, string>): Promise<string> {
    const response = await this.http.post<unknown>(path, body);

    if (response.status !== 200) {
      throw new UpstreamAuthenticationError(`Upstream authentication failed with status ${response.status}`, response.status);
    }

    const tokens = this.parseTokens(response.data);
    if (!tokens) {
      throw new UpstreamAuthenticationError("Upstream authentication response did not contain a token", response.status);
    }

    const now = Date.now();
    const expiresAt = decodeJwtExpiry(tokens.token) ?? now + FALLBACK_TOKEN_LIFETIME_MS;
    this.tokens = tokens;
    this.tokenExpiresAt = expiresAt - TOKEN_REFRESH_MARGIN_MS;

    this.logger.log(
      `Authenticated with telemetry platform via ${path === LOGIN_PATH ? "login" : "refresh"}, ` +
        `token valid until ${new Date(expiresAt).toISOString()}`
    );
    return tokens.token;
  }

  private parseTokens(data: unknown): TokenPair | undefined {
    if (!isPlainObject(data) || typeof data.token !== "string" || data.token.length === 0) {
      return undefined;
    }
    return {
      token: data.token,
      refreshToken: typeof data.refreshToken === "string" ? data.refreshToken : "",
    };
  }

  private describeError(error: unknown): UpstreamFailure {
    if (error instanceof UpstreamAuthenticationError) {
      this.logError(error, "Auth");
      return { statusCode: error.statusCode, message: error.message };
    }

    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "ECONNABORTED" || code === "ETIMEDOUT") {
      return { message: `Upstream request timed out after ${this.config.timeoutMs}ms`, timedOut: true };
    }

    return { message: `Upstream request failed: ${errorMessage(error)}` };
  }

  private bodyText(data: unknown): string | undefined {
    if (data === undefined || data === null || data === "") {
      return undefined;
    }
    const text = typeof data === "string" ? data : JSON.stringify(data);
    return text.length > MAX_BODY_LENGTH ? `${text.substring(0, MAX_BODY_LENGTH)}...` : text;
  }
}
