// cli/src/lib/azd.test.ts
import { describe, it, expect, vi, beforeEach } from "vitest";
import { getEnvValue, setEnvValue, getEnvFlag } from "./azd.js";

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

import { execa } from "execa";
const mockExeca = vi.mocked(execa);

describe("azd environment", () => {
  beforeEach(() => {
    mockExeca.mockReset();
  });

  it("reads a value", async () => {
    mockExeca.mockResolvedValueOnce({ exitCode: 0, stdout: "rg-raptor-dev\n" } as any);

    expect(await getEnvValue("AZURE_RESOURCE_GROUP")).toBe("rg-raptor-dev");
    expect(mockExeca).toHaveBeenCalledWith("azd", ["env", "get-value", "AZURE_RESOURCE_GROUP"], { reject: false });
  });

  it("treats a non-zero exit as missing", async () => {
    mockExeca.mockResolvedValueOnce({ exitCode: 1, stdout: "" } as any);
    expect(await getEnvValue("MISSING")).toBeUndefined();
  });

  it("treats an ERROR line as missing", async () => {
    mockExeca.mockResolvedValueOnce({ exitCode: 0, stdout: "ERROR: key 'MISSING' not found" } as any);
    expect(await getEnvValue("MISSING")).toBeUndefined();
  });

  it("writes a value", async () => {
    mockExeca.mockResolvedValueOnce({ exitCode: 0 } as any);

    await setEnvValue("AZURE_ACR_NAME", "devrapacr");

    expect(mockExeca).toHaveBeenCalledWith("azd", ["env", "set", "AZURE_ACR_NAME", "devrapacr"]);
  });

  it("reads flags with a fallback", async () => {
    mockExeca.mockResolvedValueOnce({ exitCode: 0, stdout: "false" } as any);
    mockExeca.mockResolvedValueOnce({ exitCode: 1, stdout: "" } as any);

    expect(await getEnvFlag("ENABLE_SQL_DATABASE", true)).toBe(false);
    expect(await getEnvFlag("ENABLE_SQL_DATABASE", true)).toBe(true);
  });
});
