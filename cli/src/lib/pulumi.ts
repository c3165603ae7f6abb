// cli/src/lib/pulumi.ts
import { execa } from "execa";
import { z } from "zod";

export interface ProvisionStackParams {
  stateStorageAccount: string;
  stackName: string;
  workDir: string;
  config: Record<string, string>;
  /** Config values stored encrypted in the stack */
  secrets?: Record<string, string>;
}

export interface DestroyStackParams {
  stateStorageAccount: string;
  stackName: string;
  workDir: string;
}

const outputsSchema = z.record(z.unknown());

export type StackOutputs = Record<string, string>;

/**
 * Login to the Azure Blob state backend.
 */
export async function pulumiLogin(stateStorageAccount: string, workDir: string): Promise<void> {
  await execa("pulumi", ["login", `azblob://state?storage_account=${stateStorageAccount}`], {
    cwd: workDir,
    stdio: "inherit",
  });
}

/**
 * Stack outputs as strings. Non-string outputs are JSON-encoded.
 */
export async function stackOutputs(workDir: string): Promise<StackOutputs> {
  const result = await execa("pulumi", ["stack", "output", "--json", "--show-secrets"], { cwd: workDir });
  const raw = outputsSchema.parse(JSON.parse(result.stdout || "{}"));

  const outputs: StackOutputs = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined) {
      continue;
    }
    outputs[key] = typeof value === "string" ? value : JSON.stringify(value);
  }
  return outputs;
}

/**
 * Select (or create) the stack, apply config and run `pulumi up`.
 */
export async function provisionStack(params: ProvisionStackParams): Promise<StackOutputs> {
  const { stateStorageAccount, stackName, workDir, config, secrets = {} } = params;

  await pulumiLogin(stateStorageAccount, workDir);

  // Select or create stack
  await execa("pulumi", ["stack", "select", stackName, "--create"], {
    cwd: workDir,
    stdio: "inherit",
    reject: false, // Don't throw if stack exists
  });

  for (const [key, value] of Object.entries(config)) {
    await execa("pulumi", ["config", "set", key, value], {
      cwd: workDir,
      stdio: "inherit",
    });
  }

  // Secret values go on stdin
  for (const [key, value] of Object.entries(secrets)) {
    await execa("pulumi", ["config", "set", "--secret", key], {
      cwd: workDir,
      input: value,
    });
  }

  await execa("pulumi", ["up", "--yes"], {
    cwd: workDir,
    stdio: "inherit",
  });

  return stackOutputs(workDir);
}

/**
 * Destroy stack resources and remove the stack. False when there is no stack.
 */
export async function destroyStack(params: DestroyStackParams): Promise<boolean> {
  const { stateStorageAccount, stackName, workDir } = params;

  await pulumiLogin(stateStorageAccount, workDir);

  const selectResult = await execa("pulumi", ["stack", "select", stackName], {
    cwd: workDir,
    reject: false,
  });

  if (selectResult.exitCode !== 0) {
    console.log(`No stack found for '${stackName}', nothing to destroy`);
    return false;
  }

  await execa("pulumi", ["destroy", "--yes"], {
    cwd: workDir,
    stdio: "inherit",
  });

  await execa("pulumi", ["stack", "rm", "--yes"], {
    cwd: workDir,
    stdio: "inherit",
  });

  return true;
}
