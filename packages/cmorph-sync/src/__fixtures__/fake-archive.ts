import { vi } from "vitest";

export const FAKE_BASE_URL = "https://archive.test/data/ds502.2/";
export const FAKE_LOGIN_URL = "https://archive.test/cgi-bin/login";
export const FAKE_SESSION_COOKIE = "sid=test-session";
/** Last-Modified sent with every file. */
export const PUBLISHED = "Tue, 01 Mar 2022 00:00:00 GMT";

export function fakeFileBody(url: string): string {
  return `netcdf:${url.slice(url.lastIndexOf("/") + 1)}`;
}

/**
 * In-process stand-in for the archive: a login endpoint plus one small
 * file per URL, served only to requests carrying the session cookie.
 */
export function fakeArchive(loginStatus = 200) {
  return vi.fn<Parameters<typeof fetch>, Promise<Response>>(async (input, init) => {
    const url = String(input);
    if (url === FAKE_LOGIN_URL) {
      return new Response(loginStatus === 200 ? "ok" : "denied", {
        status: loginStatus,
        headers: { "Set-Cookie": `${FAKE_SESSION_COOKIE}; Path=/` },
      });
    }
    const headers = new Headers(init?.headers);
    if (headers.get("cookie") !== FAKE_SESSION_COOKIE) {
      return new Response("login required", { status: 401 });
    }
    const body = fakeFileBody(url);
    return new Response(body, {
      status: 200,
      headers: {
        "content-length": String(Buffer.byteLength(body)),
        "last-modified": PUBLISHED,
      },
    });
  });
}
