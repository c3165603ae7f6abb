// cli/src/lib/az.ts
import { execa } from "execa";
import type { z } from "zod";

export class AzCliError extends Error {
  constructor(
    public args: string[],
    public exitCode: number | undefined,
    public stderr: string
  ) {
    super(`az ${args.slice(0, 3).join(" ")} failed (exit ${exitCode ?? "unknown"}): ${stderr.trim()}`);
    this.name = "AzCliError";
  }
}

/**
 * Run an Azure CLI query and return trimmed stdout. Throws on non-zero exit.
 */
export async function az(args: string[]): Promise<string> {
  const result = await execa("az", args, { reject: false });
  if (result.exitCode !== 0) {
    throw new AzCliError(args, result.exitCode, result.stderr);
  }
  return result.stdout.trim();
}

/**
 * Run an Azure CLI query whose failure is an expected outcome
 * (resource not found, missing permissions). Returns undefined on failure
 * or when the output is empty.
 */
export async function azTry(args: string[]): Promise<string | undefined> {
  const result = await execa("az", args, { reject: false });
  if (result.exitCode !== 0) {
    return undefined;
  }
  const stdout = result.stdout.trim();
  return stdout.length > 0 ? stdout : undefined;
}

/**
 * Run an Azure CLI query and return stdout and stderr together, regardless of exit code.
 * Used where the CLI reports the interesting condition only in its error text.
 */
export async function azOutput(args: string[]): Promise<{ ok: boolean; output: string }> {
  const result = await execa("az", args, { reject: false });
  const output = [result.stdout, result.stderr].filter(Boolean).join("\n").trim();
  return { ok: result.exitCode === 0, output };
}

/**
 * True when the command exits zero. Output is discarded.
 */
export async function azSucceeds(args: string[]): Promise<boolean> {
  const result = await execa("az", args, { reject: false });
  return result.exitCode === 0;
}

/**
 * Run a JSON query and validate the result.
 */
export async function azJson<T>(args: string[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const stdout = await az([...args, "-o", "json"]);
  return schema.parse(JSON.parse(stdout));
}

/**
 * Like azJson, but resolves to undefined when the command fails.
 */
export async function azTryJson<T>(args: string[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | undefined> {
  const stdout = await azTry([...args, "-o", "json"]);
  if (stdout === undefined) {
    return undefined;
  }
  const parsed = schema.safeParse(JSON.parse(stdout));
  return parsed.success ? parsed.data : undefined;
}

/**
 * Run a mutating command with output streamed to the terminal.
 */
export async function azStream(args: string[]): Promise<void> {
  await execa("az", args, { stdio: "inherit" });
}
