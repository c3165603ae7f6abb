// cli/src/commands/commit.ts
import { getCommitFromImage, type ImageLocation } from "../lib/registry.js";

/**
 * Print the commit an image was built from, or an empty line. Diagnostics go
 * to stderr so the output can be captured by a workflow step.
 */
export async function commitFromImage(location: ImageLocation): Promise<string> {
  const sha = (await getCommitFromImage(location)) ?? "";
  console.log(sha);
  return sha;
}
