import { describe, expect, it, vi } from "vitest";
import { HttpError } from "../src/errors.ts";
import { HttpClient, buildUrl, parseQueryArgs } from "../src/http.ts";

function stubFetch(response: () => Response) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response());
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("buildUrl", () => {
  it("drops empty and undefined params", () => {
    expect(buildUrl("https://api.test", "/v1/x", { a: "1", b: undefined, c: "", d: "two words" }))
      .toBe("https://api.test/v1/x?a=1&d=two+words");
  });

  it("leaves the path alone without params", () => {
    expect(buildUrl("https://api.test", "/v1/x")).toBe("https://api.test/v1/x");
  });
});

describe("HttpClient", () => {
  const http = new HttpClient({ baseUrl: "https://api.test", headers: { Authorization: "Bearer test-token" } });

  it("parses JSON and sends default headers", async () => {
    const fetchMock = stubFetch(() => new Response('{"ok":true}', { status: 200 }));
    expect(await http.get("/items", { limit: "5" })).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledWith("https://api.test/items?limit=5", {
      method: "GET",
      headers: { Authorization: "Bearer test-token" },
    });
  });

  it("serialises a JSON body", async () => {
    const fetchMock = stubFetch(() => new Response("", { status: 200 }));
    expect(await http.post("/items", { name: "x" })).toBeUndefined();
    expect(fetchMock).toHaveBeenCalledWith("https://api.test/items", {
      method: "POST",
      headers: { Authorization: "Bearer test-token", "Content-Type": "application/json" },
      body: '{"name":"x"}',
    });
  });

  it("treats 204 as no content", async () => {
    stubFetch(() => new Response(null, { status: 204 }));
    expect(await http.get("/empty")).toBeUndefined();
  });

  it("throws HttpError with status and body", async () => {
    stubFetch(() => new Response("not here", { status: 404 }));
    await expect(http.get("/gone")).rejects.toThrow(HttpError);
    await expect(http.get("/gone")).rejects.toThrow("HTTP 404 GET /gone: not here");
    await expect(http.get("/gone")).rejects.toMatchObject({ status: 404, method: "GET", path: "/gone" });
  });

  it("raw reports status without throwing", async () => {
    stubFetch(() => new Response("", { status: 500 }));
    expect(await http.raw("/x")).toEqual({ status: 500, ok: false });
  });
});

describe("parseQueryArgs", () => {
  it("splits on the first equals sign", () => {
    expect(parseQueryArgs(["date=2026-10-01", "q=a=b", "flag"])).toEqual({ date: "2026-10-01", q: "a=b" });
  });

  it("returns undefined when nothing parses", () => {
    expect(parseQueryArgs([])).toBeUndefined();
  });
});
