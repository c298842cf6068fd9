/**
 * Login data for a source, taken from the `sources.<platform>` config section
 */
export type Credentials = {
  apiKey?: string;
  username?: string;
  password?: string;
};

/**
 * Per-source login state
 *
 * Shared read-mostly across the issue tasks of one target. Anything that
 * mutates it (login, token refresh) goes through `runExclusive`.
 */
export class SourceSession {
  readonly credentials: Credentials;
  private cookies: Map<string, string>;
  private headers: Record<string, string> = {};
  private token?: string;
  private authenticated = false;
  private lock: Promise<void> = Promise.resolve();

  constructor(credentials: Credentials = {}, cookies: Record<string, string> = {}) {
    this.credentials = credentials;
    this.cookies = new Map(Object.entries(cookies));
  }

  /**
   * Run `fn` after every previously queued mutation has finished
   */
  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.lock.then(fn);
    this.lock = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /**
   * Authenticate once; concurrent callers wait for the first login
   */
  async ensureAuthenticated(login: (session: SourceSession) => Promise<void>): Promise<void> {
    if (this.authenticated) return;

    await this.runExclusive(async () => {
      if (this.authenticated) return;
      await login(this);
      this.authenticated = true;
    });
  }

  isAuthenticated(): boolean {
    return this.authenticated;
  }

  getToken(): string | undefined {
    return this.token;
  }

  setToken(token: string | undefined): void {
    this.token = token;
  }

  setCookie(name: string, value: string): void {
    this.cookies.set(name, value);
  }

  setHeader(name: string, value: string): void {
    this.headers[name] = value;
  }

  /**
   * Headers to send with every request of this session
   *
   * @param defaultCookies - Platform cookies; session cookies with the same name win
   */
  requestHeaders(defaultCookies: Record<string, string> = {}): Record<string, string> {
    const headers = { ...this.headers };
    const cookies = new Map([...Object.entries(defaultCookies), ...this.cookies]);
    if (cookies.size > 0) {
      headers.Cookie = Array.from(cookies.entries())
        .map(([name, value]) => `${name}=${value}`)
        .join('; ');
    }
    return headers;
  }
}

/**
 * Settings a session is built from (`sources.<platform>` in the config file)
 */
export type SessionSettings = Credentials & {
  cookies?: Record<string, string>;
};

/**
 * One session per platform, created on first use
 */
export class SessionPool {
  private sessions = new Map<string, SourceSession>();

  constructor(private readonly settings: Record<string, SessionSettings> = {}) {}

  get(platform: string): SourceSession {
    const key = platform.toLowerCase();
    let session = this.sessions.get(key);
    if (!session) {
      const { cookies, ...credentials } = this.settings[key] ?? {};
      session = new SourceSession(credentials, cookies);
      this.sessions.set(key, session);
    }
    return session;
  }
}
