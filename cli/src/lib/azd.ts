// cli/src/lib/azd.ts
import { execa } from "execa";

/**
 * Read a value from the current azd environment.
 * Missing keys come back as undefined: azd exits non-zero, or prints
 * an "ERROR: key not found" line on older releases.
 */
export async function getEnvValue(key: string): Promise<string | undefined> {
  const result = await execa("azd", ["env", "get-value", key], { reject: false });
  if (result.exitCode !== 0) {
    return undefined;
  }
  const value = result.stdout.trim();
  if (!value || value.startsWith("ERROR:")) {
    return undefined;
  }
  return value;
}

/**
 * Persist a value in the current azd environment.
 */
export async function setEnvValue(key: string, value: string): Promise<void> {
  await execa("azd", ["env", "set", key, value]);
}

/**
 * Read a boolean flag ("true"/"false") from the azd environment.
 */
export async function getEnvFlag(key: string, fallback: boolean): Promise<boolean> {
  const value = await getEnvValue(key);
  if (value === undefined) {
    return fallback;
  }
  return value === "true";
}
