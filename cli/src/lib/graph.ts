// cli/src/lib/graph.ts
import { azOutput, azTry } from "./az.js";

const GRAPH_URL = "https://graph.microsoft.com/v1.0";

export const DIRECTORY_READERS = "Directory Readers";

export type AddMemberResult = "added" | "already-member" | "forbidden";

export class GraphError extends Error {
  constructor(public operation: string, public output: string) {
    super(`Microsoft Graph ${operation} failed: ${output}`);
    this.name = "GraphError";
  }
}

/**
 * Id of an activated directory role, looked up by display name.
 */
export async function directoryRoleId(displayName: string): Promise<string | undefined> {
  return azTry([
    "rest",
    "--method", "GET",
    "--uri", `${GRAPH_URL}/directoryRoles`,
    "--query", `value[?displayName=='${displayName}'].id | [0]`,
    "-o", "tsv",
  ]);
}

export async function isRoleMember(roleId: string, principalId: string): Promise<boolean> {
  const found = await azTry([
    "rest",
    "--method", "GET",
    "--uri", `${GRAPH_URL}/directoryRoles/${roleId}/members`,
    "--query", `value[?id=='${principalId}'].id | [0]`,
    "-o", "tsv",
  ]);
  return found !== undefined;
}

export async function addRoleMember(roleId: string, principalId: string): Promise<AddMemberResult> {
  const body = JSON.stringify({ "@odata.id": `${GRAPH_URL}/directoryObjects/${principalId}` });
  const { ok, output } = await azOutput([
    "rest",
    "--method", "POST",
    "--uri", `${GRAPH_URL}/directoryRoles/${roleId}/members/$ref`,
    "--body", body,
    "--headers", "Content-Type=application/json",
  ]);

  if (/Forbidden|Authorization_RequestDenied/.test(output)) {
    return "forbidden";
  }
  if (/already exist|already a member/.test(output)) {
    return "already-member";
  }
  if (!ok) {
    throw new GraphError("add directory role member", output);
  }
  return "added";
}
