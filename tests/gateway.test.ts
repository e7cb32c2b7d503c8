import { describe, expect, it, vi } from "vitest";
import { parseEnv } from "../apps/common/src/env.js";
import { getSiteConfig } from "../apps/common/src/sites.js";
import type { PostRecord } from "../apps/common/src/types.js";
import {
  buildStorePayload,
  openSiteStore,
  probeStore,
  savePostRemote,
} from "../apps/publisher/src/gateway.js";
import { invalidateSiteCache } from "../apps/publisher/src/revalidate.js";
import type { InsertResult, PostStore } from "../apps/publisher/src/store.js";

const NOW = new Date("2026-03-01T10:00:00.000Z");

function record(overrides: Partial<PostRecord> = {}): PostRecord {
  return {
    title: "Как попросить прибавку",
    slug: "kak-poprosit-pribavku",
    excerpt: "Коротко о главном",
    content: "Текст статьи",
    category: "Зарплаты",
    tags: ["зарплата"],
    author: "Анна Ковалёва",
    readTime: 6,
    ...overrides,
  };
}

function fakeStore(taken: string[], insert: InsertResult | Error): PostStore & {
  rows: Record<string, unknown>[];
} {
  const rows: Record<string, unknown>[] = [];
  return {
    rows,
    async ping() {
      return { ok: true, message: null };
    },
    async slugExists(slug) {
      return taken.includes(slug);
    },
    async insert(row) {
      rows.push(row);
      if (insert instanceof Error) {
        throw insert;
      }
      return insert;
    },
  };
}

describe("buildStorePayload", () => {
  it("maps generic fields to the hr site's columns", () => {
    const payload = buildStorePayload(
      record({ categorySlug: "zarplaty", categoryIcon: "💰", metaTitle: "ignored" }),
      "kak-poprosit-pribavku-2",
      getSiteConfig("hr"),
      { id: "post-1", now: NOW },
    );

    expect(payload).toEqual({
      id: "post-1",
      title: "Как попросить прибавку",
      slug: "kak-poprosit-pribavku-2",
      excerpt: "Коротко о главном",
      content: "Текст статьи",
      category_name: "Зарплаты",
      category_slug: "zarplaty",
      category_icon: "💰",
      tags: ["зарплата"],
      author_name: "Анна Ковалёва",
      reading_time: 6,
      published_at: "2026-03-01T10:00:00.000Z",
      updated_at: "2026-03-01T10:00:00.000Z",
      created_at: "2026-03-01T10:00:00.000Z",
      is_published: true,
    });
  });

  it("fills missing optional mfo fields with defaults", () => {
    const payload = buildStorePayload(
      record({ category: "Советы", author: null }),
      "slug",
      getSiteConfig("mfo"),
      { id: "post-2", now: NOW },
    );

    expect(payload).toMatchObject({
      category: "Советы",
      author: "",
      read_time: 6,
      meta_title: "",
      meta_description: "",
      seo_keywords: [],
    });
    expect(payload).not.toHaveProperty("category_name");
    expect(payload).not.toHaveProperty("category_icon");
  });
});

describe("savePostRemote", () => {
  const hr = getSiteConfig("hr");

  it("inserts under the first free slug", async () => {
    const store = fakeStore(["kak-poprosit-pribavku"], { ok: true, status: 201 });

    const result = await savePostRemote(record(), store, hr, { now: NOW, newId: () => "post-1" });

    expect(result).toEqual({ saved: true, slug: "kak-poprosit-pribavku-2", id: "post-1", reason: null });
    expect(store.rows[0].slug).toBe("kak-poprosit-pribavku-2");
  });

  it("reports a uniqueness violation as a conflict", async () => {
    const store = fakeStore([], {
      ok: false,
      conflict: true,
      status: 409,
      message: "duplicate key value violates unique constraint",
    });

    await expect(savePostRemote(record(), store, hr, { now: NOW })).resolves.toEqual({
      saved: false,
      slug: "kak-poprosit-pribavku",
      id: null,
      reason: {
        kind: "conflict",
        slug: "kak-poprosit-pribavku",
        message: "duplicate key value violates unique constraint",
      },
    });
  });

  it("reports other rejections as API failures", async () => {
    const store = fakeStore([], { ok: false, conflict: false, status: 400, message: "bad column" });

    const result = await savePostRemote(record(), store, hr, { now: NOW });

    expect(result.reason).toEqual({ kind: "api", status: 400, body: "bad column" });
  });

  it("reports thrown errors as transport failures", async () => {
    const store = fakeStore([], new Error("connect ECONNREFUSED"));

    const result = await savePostRemote(record(), store, hr, { now: NOW });

    expect(result).toMatchObject({
      saved: false,
      reason: { kind: "transport", message: "connect ECONNREFUSED" },
    });
  });
});

describe("store availability", () => {
  const mfo = getSiteConfig("mfo");

  it("opens no store without credentials", () => {
    expect(openSiteStore(mfo, parseEnv({}))).toBeNull();
  });

  it("treats a missing, failing or throwing store as unreachable", async () => {
    await expect(probeStore(null, mfo)).resolves.toBe(false);

    const down = fakeStore([], { ok: true, status: 201 });
    down.ping = async () => ({ ok: false, message: "503: unavailable" });
    await expect(probeStore(down, mfo)).resolves.toBe(false);

    down.ping = async () => {
      throw new Error("timeout");
    };
    await expect(probeStore(down, mfo)).resolves.toBe(false);

    await expect(probeStore(fakeStore([], { ok: true, status: 201 }), mfo)).resolves.toBe(true);
  });
});

describe("invalidateSiteCache", () => {
  const mfo = getSiteConfig("mfo");

  it("skips without a secret", async () => {
    const fetchImpl = vi.fn<typeof fetch>();

    const status = await invalidateSiteCache(
      { storeUrl: null, storeKey: null, siteUrl: "http://localhost:3000", revalidateSecret: null },
      mfo,
      fetchImpl,
    );

    expect(status).toBe("skipped");
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("posts the secret and blog path", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("{}", { status: 200 }));

    const status = await invalidateSiteCache(
      {
        storeUrl: null,
        storeKey: null,
        siteUrl: "https://mfo.example.test",
        revalidateSecret: "test-secret",
      },
      mfo,
      fetchImpl,
    );

    expect(status).toBe("ok");
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://mfo.example.test/api/revalidate");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify({ secret: "test-secret", path: "/blog" }));
  });

  it("reports a rejected or failed request as failed", async () => {
    const credentials = {
      storeUrl: null,
      storeKey: null,
      siteUrl: "https://mfo.example.test",
      revalidateSecret: "test-secret",
    };

    const rejected = vi.fn<typeof fetch>(async () => new Response("no", { status: 401 }));
    await expect(invalidateSiteCache(credentials, mfo, rejected)).resolves.toBe("failed");

    const failing = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });
    await expect(invalidateSiteCache(credentials, mfo, failing)).resolves.toBe("failed");
  });
});
