import { before, after, describe, it } from "node:test";
import assert from "node:assert/strict";

import { ConfigError, NetworkError, SearchError, logger } from "@deepsearch/core";

import { BraveSearchClient, type FetchLike, type HttpResponseLike } from "../search-client.js";

interface Call {
  url: string;
  headers: Record<string, string>;
}

function jsonResponse(status: number, body: unknown): HttpResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => JSON.stringify(body),
    json: async () => body,
  };
}

function scriptedFetch(responses: HttpResponseLike[], calls: Call[]): FetchLike {
  return async (url, init) => {
    calls.push({ url, headers: init.headers });
    const next = responses.shift();
    if (!next) {
      throw new Error("no scripted response left");
    }
    return next;
  };
}

const PAGE = {
  web: {
    results: [
      { title: "First", url: "https://one.test", description: "about one", age: "2 days ago" },
      { title: "Second", url: "https://two.test", page_age: "2024-05-01" },
    ],
  },
};

describe("BraveSearchClient", () => {
  before(() => logger.silence());
  after(() => logger.resetHandlers());

  it("requires an API key", () => {
    assert.throws(
      () => new BraveSearchClient({ apiKey: "" }),
      (error: unknown) => error instanceof ConfigError
    );
  });

  it("normalises results and sends the subscription token", async () => {
    const calls: Call[] = [];
    const client = new BraveSearchClient({
      apiKey: "test-secret",
      fetch: scriptedFetch([jsonResponse(200, PAGE)], calls),
      sleep: async () => undefined,
    });

    const records = await client.discover("solid state batteries", 5);

    assert.deepEqual(records, [
      { title: "First", url: "https://one.test", description: "about one", age: "2 days ago" },
      { title: "Second", url: "https://two.test", description: "", age: "2024-05-01" },
    ]);
    assert.equal(
      calls[0]?.url,
      "https://api.search.brave.com/res/v1/web/search?q=solid+state+batteries&count=5"
    );
    assert.equal(calls[0]?.headers["X-Subscription-Token"], "test-secret");
  });

  it("caps the requested count at 20", async () => {
    const calls: Call[] = [];
    const client = new BraveSearchClient({
      apiKey: "test-secret",
      fetch: scriptedFetch([jsonResponse(200, {})], calls),
      sleep: async () => undefined,
    });

    const records = await client.search("q", 50);

    assert.deepEqual(records, []);
    assert.equal(calls[0]?.url.endsWith("count=20"), true);
  });

  it("paces consecutive requests", async () => {
    const waits: number[] = [];
    let clock = 10_000;
    const client = new BraveSearchClient({
      apiKey: "test-secret",
      fetch: scriptedFetch([jsonResponse(200, PAGE), jsonResponse(200, PAGE)], []),
      sleep: async (ms) => {
        waits.push(ms);
      },
      now: () => clock,
    });

    await client.search("first");
    clock += 400;
    await client.search("second");

    assert.deepEqual(waits, [700]);
  });

  it("spaces out concurrent requests on one client", async () => {
    const waits: number[] = [];
    const calls: Call[] = [];
    const client = new BraveSearchClient({
      apiKey: "test-secret",
      fetch: scriptedFetch(
        [jsonResponse(200, PAGE), jsonResponse(200, PAGE), jsonResponse(200, PAGE)],
        calls
      ),
      sleep: async (ms) => {
        waits.push(ms);
      },
      now: () => 5_000,
    });

    await Promise.all([
      client.discover("alpha", 3),
      client.discover("beta", 3),
      client.discover("gamma", 3),
    ]);

    assert.equal(calls.length, 3);
    assert.deepEqual([...waits].sort((a, b) => a - b), [1100, 2200]);
  });

  it("retries a 429 once after the rate-limit delay", async () => {
    const waits: number[] = [];
    const calls: Call[] = [];
    const client = new BraveSearchClient({
      apiKey: "test-secret",
      fetch: scriptedFetch([jsonResponse(429, { error: "limited" }), jsonResponse(200, PAGE)], calls),
      sleep: async (ms) => {
        waits.push(ms);
      },
      now: () => 0,
    });

    const records = await client.search("q");

    assert.equal(records.length, 2);
    assert.equal(calls.length, 2);
    assert.deepEqual(waits, [2000, 1100]);
  });

  it("fails on a second 429", async () => {
    const client = new BraveSearchClient({
      apiKey: "test-secret",
      fetch: scriptedFetch([jsonResponse(429, "limited"), jsonResponse(429, "limited")], []),
      sleep: async () => undefined,
    });

    await assert.rejects(client.search("q"), (error: unknown) => {
      assert.ok(error instanceof SearchError);
      assert.equal(error.statusCode, 429);
      assert.equal(error.message, 'Brave Search API error (429): "limited"');
      return true;
    });
  });

  it("does not retry other HTTP errors", async () => {
    const calls: Call[] = [];
    const client = new BraveSearchClient({
      apiKey: "test-secret",
      fetch: scriptedFetch([jsonResponse(500, "oops"), jsonResponse(200, PAGE)], calls),
      sleep: async () => undefined,
    });

    await assert.rejects(client.search("q"), SearchError);
    assert.equal(calls.length, 1);
  });

  it("rejects payloads that do not match the schema", async () => {
    const client = new BraveSearchClient({
      apiKey: "test-secret",
      fetch: scriptedFetch([jsonResponse(200, { web: { results: [{ title: 1 }] } })], []),
      sleep: async () => undefined,
    });

    await assert.rejects(client.search("q"), /^SearchError: Unexpected Brave Search response: web\.results\.0\.title/);
  });

  it("wraps transport failures as network errors", async () => {
    const client = new BraveSearchClient({
      apiKey: "test-secret",
      fetch: async () => {
        throw new Error("getaddrinfo ENOTFOUND");
      },
      sleep: async () => undefined,
    });

    await assert.rejects(client.search("q"), (error: unknown) => {
      assert.ok(error instanceof NetworkError);
      assert.equal(error.message, "Failed to reach Brave Search: getaddrinfo ENOTFOUND");
      return true;
    });
  });
});
