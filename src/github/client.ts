import { Octokit } from "@octokit/rest";
import { ConfigurationError } from "../core/errors.js";

export function makeOctokit(options: { token?: string; baseUrl?: string } = {}) {
  const token = options.token ?? process.env.GITHUB_TOKEN;
  if (!token) throw new ConfigurationError("Missing GITHUB_TOKEN");
  return new Octokit({ auth: token, baseUrl: options.baseUrl, userAgent: "repo-sweep" });
}
