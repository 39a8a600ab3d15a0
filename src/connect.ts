import { makeAzureConnection } from "./azure/client.js";
import { AzureDevOpsPlatform } from "./azure/platform.js";
import { DEFAULT_AZURE_DEVOPS_URL } from "./core/config.js";
import type { PlatformClient } from "./core/platform.js";
import type { RunConfig } from "./core/types.js";
import { makeOctokit } from "./github/client.js";
import { GitHubPlatform } from "./github/platform.js";

/** Builds the authenticated client for the platform named in the configuration. */
export async function connectPlatform(config: RunConfig): Promise<PlatformClient> {
  switch (config.platform) {
    case "github":
      return new GitHubPlatform(makeOctokit({ baseUrl: config.baseUrl }), config.organization);
    case "azure-devops": {
      const baseUrl = config.baseUrl ?? DEFAULT_AZURE_DEVOPS_URL;
      const connection = await makeAzureConnection({ baseUrl, organization: config.organization });
      return new AzureDevOpsPlatform(connection, { organization: config.organization, baseUrl });
    }
  }
}
