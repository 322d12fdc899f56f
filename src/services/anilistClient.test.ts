import { describe, it, expect, vi } from "vitest";
import { ClientError, GraphQLClient } from "graphql-request";
import { ErrorKind } from "../errors/ledgerError.js";
import { AnilistClient } from "./anilistClient.js";

const API_URL = "https://anilist.test/graphql";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

const statistics = {
  anime: {
    count: 3,
    meanScore: 81.5,
    statuses: [{ status: "COMPLETED", count: 3 }],
    scores: [{ score: 80, count: 3 }],
    genres: [{ genre: "Action", count: 3 }],
    formats: [{ format: "TV", count: 3 }],
    countries: [{ country: "JP", count: 3 }],
  },
  manga: {
    count: 1,
    meanScore: 70,
    statuses: [{ status: "CURRENT", count: 1 }],
    scores: [],
    genres: [],
    formats: [],
    countries: [],
  },
};

function clientFor(fetchImpl: typeof fetch): AnilistClient {
  return new AnilistClient({ client: new GraphQLClient(API_URL, { fetch: fetchImpl }) });
}

describe("AnilistClient", () => {
  it("returns the canonical profile", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ data: { User: { id: 501, name: "KStorm" } } }));
    const client = clientFor(fetchImpl);

    expect(await client.fetchProfile("kstorm")).toEqual({ id: 501, name: "KStorm" });

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe(API_URL);
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body)).variables).toEqual({ name: "kstorm" });
  });

  it("returns null when AniList answers 404", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ data: { User: null }, errors: [{ message: "Not Found.", status: 404 }] }, 404),
    );

    expect(await clientFor(fetchImpl).fetchProfile("nobody")).toBeNull();
  });

  it("rethrows other HTTP failures as client errors", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ errors: [{ message: "Internal Server Error", status: 500 }] }, 500),
    );

    const failure = clientFor(fetchImpl).fetchProfile("kstorm");

    await expect(failure).rejects.toBeInstanceOf(ClientError);
    await expect(failure).rejects.toMatchObject({ response: { status: 500 } });
    vi.restoreAllMocks();
  });

  it("parses list statistics into a catalog snapshot", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ data: { User: { id: 501, name: "kstorm", statistics } } }),
    );

    const snapshot = await clientFor(fetchImpl).fetchCatalogSnapshot("kstorm");

    expect(snapshot.anime.statuses).toEqual([{ status: "COMPLETED", count: 3 }]);
    expect(snapshot.manga.count).toBe(1);
  });

  it("reports an unknown user as HandleNotFound when fetching statistics", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ data: { User: null }, errors: [{ message: "Not Found.", status: 404 }] }, 404),
    );

    await expect(clientFor(fetchImpl).fetchCatalogSnapshot("nobody")).rejects.toMatchObject({
      kind: ErrorKind.HandleNotFound,
    });
  });

  it("reports a null user in a successful answer as HandleNotFound", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ data: { User: null } }));

    await expect(clientFor(fetchImpl).fetchCatalogSnapshot("nobody")).rejects.toMatchObject({
      kind: ErrorKind.HandleNotFound,
    });
  });
});
