/**
 * Archive session lifecycle: log in with user credentials, hand out the
 * session id, and renew it when the server asks for authentication again.
 * One instance per client.
 */

import { AuthFailure, CancelledError, NetworkError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";

const STATUS_AUTHENTICATION_ACCEPTED = 260;
const STATUS_BAD_CREDENTIALS = 462;
const STATUS_SESSIONS_EXCEEDED = 464;

export interface SessionCredentials {
  username: string;
  password: string;
}

export interface ArchiveSessionOptions {
  /** API root, e.g. https://archive.example.com/acme/api/ */
  apiRoot: string;
  credentials: SessionCredentials;
  fetch?: typeof fetch;
  logger?: Logger;
}

/** Settle with `promise`, or reject with CancelledError once `signal` aborts. */
function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new CancelledError());
  let onAbort: () => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new CancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return Promise.race([promise, aborted]).finally(() => signal.removeEventListener("abort", onAbort));
}

export class ArchiveSession {
  private readonly apiRoot: string;
  private readonly authValue: string;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  private sessionId: string | null = null;
  private userId: string | null = null;
  private pendingLogin: Promise<string> | null = null;

  constructor(options: ArchiveSessionOptions) {
    this.apiRoot = options.apiRoot;
    const { username, password } = options.credentials;
    this.authValue = `AuthRequest ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger ?? defaultLogger;
  }

  get isAuthenticated(): boolean {
    return this.sessionId !== null;
  }

  get currentUserId(): string | null {
    return this.userId;
  }

  /** Current session id, logging in first when there is none. */
  async getSessionId(signal?: AbortSignal): Promise<string> {
    return this.sessionId ?? this.login(signal);
  }

  /**
   * Replace `staleId` with a fresh session. Concurrent callers holding the
   * same stale id share one login.
   */
  async renew(staleId: string, signal?: AbortSignal): Promise<string> {
    if (this.sessionId !== null && this.sessionId !== staleId) {
      return this.sessionId;
    }
    this.sessionId = null;
    this.logger.info("Server asked for a login. Renewing session.");
    return this.login(signal);
  }

  /**
   * Log in, or join the login already in flight. The shared request runs
   * without any caller's signal; each caller stops waiting on its own.
   */
  login(signal?: AbortSignal): Promise<string> {
    if (!this.pendingLogin) {
      this.pendingLogin = this.doLogin().finally(() => {
        this.pendingLogin = null;
      });
    }
    return raceAbort(this.pendingLogin, signal);
  }

  disconnect(): void {
    this.sessionId = null;
    this.userId = null;
  }

  private async doLogin(): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(this.apiRoot, {
        method: "GET",
        headers: { Authorization: this.authValue },
      });
    } catch (err) {
      throw new NetworkError(`Login request failed: ${err instanceof Error ? err.message : String(err)}`, undefined, {
        cause: err,
      });
    }

    if (response.status === STATUS_AUTHENTICATION_ACCEPTED) {
      const sessionId = response.headers.get("SessionId");
      if (!sessionId) {
        throw new AuthFailure("Login accepted but no session id was returned", response.status);
      }
      this.sessionId = sessionId;
      this.userId = response.headers.get("UserId");
      this.logger.debug("Archive session established", { userId: this.userId });
      return sessionId;
    }

    if (response.status === STATUS_BAD_CREDENTIALS || response.status === 401 || response.status === 403) {
      throw new AuthFailure("Bad credentials", response.status);
    }
    if (response.status === STATUS_SESSIONS_EXCEEDED) {
      throw new NetworkError("User sessions exceeded", response.status);
    }
    throw new NetworkError(`Unexpected status ${response.status} when logging in`, response.status);
  }
}
