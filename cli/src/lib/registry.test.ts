// cli/src/lib/registry.test.ts
import { describe, it, expect, vi, beforeEach, afterAll } from "vitest";
import { getCommitFromImage, revisionFromConfig, exchangeAcrToken, RegistryTokenError } from "./registry.js";

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

import { execa } from "execa";
const mockExeca = vi.mocked(execa);

const mockFetch = vi.fn();
global.fetch = mockFetch;

function jsonResponse(body: unknown) {
  return { ok: true, status: 200, json: async () => body, text: async () => JSON.stringify(body) };
}

const location = { registry: "devrapacr", repository: "raptor/frontend-dev", digest: "sha256:top" };

describe("revisionFromConfig", () => {
  it("prefers the OCI revision label", () => {
    expect(revisionFromConfig({
      config: { Labels: { "org.opencontainers.image.revision": "aaa", "org.opencontainers.image.vcs-ref": "bbb" } },
    })).toBe("aaa");
  });

  it("falls back to vcs-ref and container_config", () => {
    expect(revisionFromConfig({ config: { Labels: { "org.opencontainers.image.vcs-ref": "bbb" } } })).toBe("bbb");
    expect(revisionFromConfig({
      config: { Labels: null },
      container_config: { Labels: { "org.opencontainers.image.revision": "ccc" } },
    })).toBe("ccc");
  });

  it("matches the revision key case-insensitively", () => {
    expect(revisionFromConfig({ config: { Labels: { "Org.OpenContainers.Image.Revision": "ddd" } } })).toBe("ddd");
  });

  it("returns undefined without labels", () => {
    expect(revisionFromConfig({})).toBeUndefined();
  });
});

describe("exchangeAcrToken", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("posts a refresh token grant scoped to the repository", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ access_token: "pull-token" }));

    expect(await exchangeAcrToken("devrapacr", "raptor/frontend-dev", "refresh-token")).toBe("pull-token");

    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe("https://devrapacr.azurecr.io/oauth2/token");
    const body = new URLSearchParams(init.body);
    expect(body.get("grant_type")).toBe("refresh_token");
    expect(body.get("service")).toBe("devrapacr.azurecr.io");
    expect(body.get("scope")).toBe("repository:raptor/frontend-dev:pull");
    expect(body.get("refresh_token")).toBe("refresh-token");
  });

  it("throws RegistryTokenError on HTTP failure", async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 401, text: async () => "unauthorized" });

    await expect(exchangeAcrToken("devrapacr", "raptor/frontend-dev", "refresh-token")).rejects.toThrow(RegistryTokenError);
  });
});

describe("getCommitFromImage", () => {
  const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

  beforeEach(() => {
    mockExeca.mockReset();
    mockFetch.mockReset();
    warnSpy.mockClear();
  });

  afterAll(() => {
    warnSpy.mockRestore();
  });

  it("reads the label from a single-platform image", async () => {
    mockExeca.mockResolvedValueOnce({ exitCode: 0, stdout: "refresh-token" } as any);
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ access_token: "pull-token" }))
      .mockResolvedValueOnce(jsonResponse({
        mediaType: "application/vnd.oci.image.manifest.v1+json",
        config: { digest: "sha256:cfg" },
      }))
      .mockResolvedValueOnce(jsonResponse({ config: { Labels: { "org.opencontainers.image.revision": "0123abc" } } }));

    expect(await getCommitFromImage(location)).toBe("0123abc");
    expect(mockFetch.mock.calls[1]?.[0]).toBe("https://devrapacr.azurecr.io/v2/raptor/frontend-dev/manifests/sha256:top");
    expect(mockFetch.mock.calls[2]?.[0]).toBe("https://devrapacr.azurecr.io/v2/raptor/frontend-dev/blobs/sha256:cfg");
    expect(mockFetch.mock.calls[2]?.[1]).toEqual({ headers: { Authorization: "Bearer pull-token" } });
  });

  it("walks an image index until a child has the label", async () => {
    mockExeca.mockResolvedValueOnce({ exitCode: 0, stdout: "refresh-token" } as any);
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ access_token: "pull-token" }))
      .mockResolvedValueOnce(jsonResponse({
        mediaType: "application/vnd.oci.image.index.v1+json",
        manifests: [{ digest: "sha256:child1" }, { digest: "sha256:child2" }],
      }))
      .mockResolvedValueOnce(jsonResponse({ config: { digest: "sha256:cfg1" } }))
      .mockResolvedValueOnce(jsonResponse({ config: { Labels: {} } }))
      .mockResolvedValueOnce(jsonResponse({ config: { digest: "sha256:cfg2" } }))
      .mockResolvedValueOnce(jsonResponse({ config: { Labels: { "org.opencontainers.image.revision": "fedcba9" } } }));

    expect(await getCommitFromImage(location)).toBe("fedcba9");
    expect(mockFetch.mock.calls[4]?.[0]).toBe("https://devrapacr.azurecr.io/v2/raptor/frontend-dev/manifests/sha256:child2");
  });

  it("returns undefined without a refresh token", async () => {
    mockExeca.mockResolvedValueOnce({ exitCode: 1, stdout: "" } as any);

    expect(await getCommitFromImage(location)).toBeUndefined();
    expect(mockFetch).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith("Warning: Failed to get ACR refresh token for registry: devrapacr");
  });

  it("returns undefined when a request fails", async () => {
    mockExeca.mockResolvedValueOnce({ exitCode: 0, stdout: "refresh-token" } as any);
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ access_token: "pull-token" }))
      .mockResolvedValueOnce({ ok: false, status: 404, text: async () => "manifest unknown" });

    expect(await getCommitFromImage(location)).toBeUndefined();
    expect(warnSpy).toHaveBeenCalledWith("Warning: Registry request failed at manifest step: manifest unknown");
  });

  it("skips the lookup without a digest", async () => {
    expect(await getCommitFromImage({ ...location, digest: "" })).toBeUndefined();
    expect(mockExeca).not.toHaveBeenCalled();
  });
});
