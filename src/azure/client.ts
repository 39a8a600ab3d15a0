import { DefaultAzureCredential } from "@azure/identity";
import azdev from "azure-devops-node-api";
import type { WebApi } from "azure-devops-node-api";
import { AuthenticationError, errorMessage } from "../core/errors.js";

/** Resource id of Azure DevOps in Microsoft Entra ID. */
const AZURE_DEVOPS_SCOPE = "499b84ac-1321-427f-aa17-267ca6975798/.default";

export function organizationUrl(baseUrl: string, organization: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(organization)}`;
}

/**
 * Uses AZURE_DEVOPS_TOKEN (a personal access token) when set, otherwise asks
 * the ambient Azure credential chain (az login, managed identity, ...) for a
 * bearer token.
 */
export async function makeAzureConnection(args: {
  baseUrl: string;
  organization: string;
  token?: string;
}): Promise<WebApi> {
  const url = organizationUrl(args.baseUrl, args.organization);
  const pat = args.token ?? process.env.AZURE_DEVOPS_TOKEN;
  if (pat) {
    return new azdev.WebApi(url, azdev.getPersonalAccessTokenHandler(pat));
  }

  let bearer: string | undefined;
  try {
    const credential = new DefaultAzureCredential();
    const accessToken = await credential.getToken(AZURE_DEVOPS_SCOPE);
    bearer = accessToken?.token;
  } catch (err) {
    throw new AuthenticationError(`No Azure DevOps credential available: ${errorMessage(err)}`, { cause: err });
  }
  if (!bearer) throw new AuthenticationError("The Azure credential chain returned no token.");
  return new azdev.WebApi(url, azdev.getBearerHandler(bearer));
}
