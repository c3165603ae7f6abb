import { describe, it, expect } from "vitest";
import {
  parseImageRef,
  isDigestRef,
  hasSha256Digest,
  imageDomain,
  acrDomain,
  isAcrDomain,
  shortDigest,
  digestImage,
  ImageReferenceError,
} from "./image.js";

const DIGEST = "sha256:0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef";

describe("parseImageRef", () => {
  it("parses an ACR digest reference", () => {
    const ref = parseImageRef(`devrapacr.azurecr.io/raptor/frontend-dev@${DIGEST}`);
    expect(ref.domain).toBe("devrapacr.azurecr.io");
    expect(ref.registryName).toBe("devrapacr");
    expect(ref.path).toBe(`raptor/frontend-dev@${DIGEST}`);
    expect(ref.repository).toBe("raptor/frontend-dev");
    expect(ref.digest).toBe(DIGEST);
    expect(ref.tag).toBeUndefined();
  });

  it("parses a tagged public reference", () => {
    const ref = parseImageRef("mcr.microsoft.com/azuredocs/containerapps-helloworld:latest");
    expect(ref.domain).toBe("mcr.microsoft.com");
    expect(ref.registryName).toBeUndefined();
    expect(ref.repository).toBe("azuredocs/containerapps-helloworld");
    expect(ref.tag).toBe("latest");
  });

  it("parses a reference with no tag or digest", () => {
    const ref = parseImageRef("ghcr.io/example/app");
    expect(ref.repository).toBe("example/app");
    expect(ref.tag).toBeUndefined();
    expect(ref.digest).toBeUndefined();
  });

  it("throws ImageReferenceError without a registry", () => {
    expect(() => parseImageRef("nginx:latest")).toThrow(ImageReferenceError);
  });
});

describe("image helpers", () => {
  it("detects digest references", () => {
    expect(isDigestRef(`a.azurecr.io/r@${DIGEST}`)).toBe(true);
    expect(isDigestRef("a.azurecr.io/r:1.0")).toBe(false);
    expect(hasSha256Digest(`a.azurecr.io/r@${DIGEST}`)).toBe(true);
    expect(hasSha256Digest("a.azurecr.io/r@md5:abc")).toBe(false);
  });

  it("builds and recognises ACR domains", () => {
    expect(acrDomain("devrapacr")).toBe("devrapacr.azurecr.io");
    expect(isAcrDomain("devrapacr.azurecr.io")).toBe(true);
    expect(isAcrDomain("mcr.microsoft.com")).toBe(false);
    expect(imageDomain("mcr.microsoft.com/x:1")).toBe("mcr.microsoft.com");
  });

  it("shortens digests to the algorithm and 12 hex characters", () => {
    expect(shortDigest(DIGEST)).toBe("sha256:0123456789ab...");
  });

  it("assembles a digest image", () => {
    expect(digestImage("t.azurecr.io", "raptor/backend-test", DIGEST)).toBe(
      `t.azurecr.io/raptor/backend-test@${DIGEST}`
    );
  });
});
