import { describe, it, expect, vi } from "vitest";
import { authenticate, readSecret, Session } from "./session.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { isCLIError } from "./errors/types.js";

const LOGIN_URL = "https://archive.test/cgi-bin/login";

function fakeFetch(response: () => Response) {
  return vi.fn<Parameters<typeof fetch>, Promise<Response>>(async () => response());
}

function spyLogger(): Logger & { info: ReturnType<typeof vi.fn> } {
  const logger = createNoopLogger();
  return { ...logger, info: vi.fn() };
}

describe("Session", () => {
  it("keeps name=value pairs and drops cookie attributes", () => {
    const session = Session.fromSetCookie([
      "gkencryptid=abc123; Path=/; Secure; HttpOnly",
      "gkcookieid=42; Max-Age=3600",
    ]);

    expect(session.size).toBe(2);
    expect(session.cookieHeader()).toBe("gkencryptid=abc123; gkcookieid=42");
  });

  it("ignores malformed entries", () => {
    const session = Session.fromSetCookie(["=nameless", "novalue", "ok=1"]);

    expect(session.cookieHeader()).toBe("ok=1");
  });
});

describe("readSecret", () => {
  it("returns RDAPSWD", () => {
    expect(readSecret({ RDAPSWD: "test-secret" })).toBe("test-secret");
  });

  it("fails before any network activity when RDAPSWD is unset", () => {
    expect(() => readSecret({})).toThrow("RDAPSWD is not set");
  });
});

describe("authenticate", () => {
  it("posts form-encoded credentials to the login endpoint", async () => {
    const fetchImpl = fakeFetch(
      () => new Response("welcome", { status: 200, headers: { "Set-Cookie": "sid=s1; Path=/" } })
    );

    const session = await authenticate(
      { username: "user@example.org", password: "test-secret" },
      { loginUrl: LOGIN_URL, logger: createNoopLogger(), fetchImpl }
    );

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(LOGIN_URL);
    expect(init?.method).toBe("POST");
    expect(String(init?.body)).toBe("email=user%40example.org&passwd=test-secret&action=login");
    expect(session.cookieHeader()).toBe("sid=s1");
  });

  it("rejects any status other than 200 and logs the response body", async () => {
    const fetchImpl = fakeFetch(() => new Response("Access denied", { status: 403 }));
    const logger = spyLogger();

    const result = authenticate(
      { username: "user@example.org", password: "wrong" },
      { loginUrl: LOGIN_URL, logger, fetchImpl }
    );

    await expect(result).rejects.toSatisfy(
      (error: unknown) => isCLIError(error) && error.code === "AUTH_FAILED"
    );
    expect(logger.info).toHaveBeenCalledWith("Bad Authentication", { status: 403 });
    expect(logger.info).toHaveBeenCalledWith("Access denied");
  });

  it("treats 201 as a failure too", async () => {
    const fetchImpl = fakeFetch(() => new Response("", { status: 201 }));

    await expect(
      authenticate(
        { username: "user@example.org", password: "test-secret" },
        { loginUrl: LOGIN_URL, logger: createNoopLogger(), fetchImpl }
      )
    ).rejects.toThrow("Bad authentication (HTTP 201)");
  });
});
