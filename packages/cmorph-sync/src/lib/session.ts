import type { Logger } from "./logger.js";
import { authFailed, missingSecret } from "./errors/catalog.js";
import { SECRET_ENV } from "./config.js";

export interface Credentials {
  /** RDA account email */
  username: string;
  password: string;
}

export interface AuthenticateOptions {
  loginUrl: string;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

/**
 * Cookies handed out by the login endpoint. Read-only once created; lives
 * for one run and is never persisted.
 */
export class Session {
  private readonly cookies: ReadonlyMap<string, string>;

  constructor(cookies: Iterable<[string, string]>) {
    this.cookies = new Map(cookies);
  }

  static fromSetCookie(headers: string[]): Session {
    const pairs: [string, string][] = [];
    for (const header of headers) {
      const [pair] = header.split(";");
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      pairs.push([pair.slice(0, eq).trim(), pair.slice(eq + 1).trim()]);
    }
    return new Session(pairs);
  }

  get size(): number {
    return this.cookies.size;
  }

  cookieHeader(): string {
    return [...this.cookies].map(([name, value]) => `${name}=${value}`).join("; ");
  }
}

/**
 * Read the account password from the environment.
 */
export function readSecret(env: NodeJS.ProcessEnv = process.env): string {
  const secret = env[SECRET_ENV];
  if (!secret) {
    throw missingSecret(SECRET_ENV);
  }
  return secret;
}

/**
 * Log in to the archive. Any status other than 200 is logged with the
 * response body and rejected with AUTH_FAILED.
 */
export async function authenticate(
  credentials: Credentials,
  { loginUrl, logger, fetchImpl = globalThis.fetch }: AuthenticateOptions
): Promise<Session> {
  const body = new URLSearchParams({
    email: credentials.username,
    passwd: credentials.password,
    action: "login",
  });

  const response = await fetchImpl(loginUrl, {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body,
  });

  if (response.status !== 200) {
    const text = await response.text();
    logger.info("Bad Authentication", { status: response.status });
    logger.info(text);
    throw authFailed(response.status, text);
  }

  const session = Session.fromSetCookie(response.headers.getSetCookie());
  logger.debug("Authenticated", { user: credentials.username, cookies: session.size });
  return session;
}
