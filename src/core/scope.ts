import type { Logger } from "@slack/logger";
import { AuthenticationError, NotFoundError, RunCancelledError, ScopeResolutionError, errorMessage } from "./errors.js";
import { formatTarget, toRepoTarget, type PlatformClient, type RepositoryRef } from "./platform.js";
import type { CallRunner } from "./retry.js";
import type { RepoTarget, Scope, ScopeEntry } from "./types.js";

type ResolveArgs = {
  client: PlatformClient;
  organization: string;
  scope: Scope;
  call: CallRunner;
  logger: Logger;
};

function dedupeTargets(targets: RepoTarget[]): RepoTarget[] {
  const seen = new Set<string>();
  const result: RepoTarget[] = [];
  for (const target of targets) {
    const key = `${target.projectId}\u0000${target.repositoryId}`;
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(target);
  }
  return result;
}

/**
 * Authentication failures and cancellation pass through as they are; a missing
 * resource or an unreachable organization becomes a ScopeResolutionError.
 */
async function lookup<T>(args: ResolveArgs, label: string, notFound: string, fetch: () => Promise<T>): Promise<T> {
  try {
    return await args.call(label, fetch);
  } catch (err) {
    if (err instanceof AuthenticationError || err instanceof RunCancelledError) throw err;
    if (err instanceof NotFoundError) throw new ScopeResolutionError(notFound, { cause: err });
    throw new ScopeResolutionError(
      `Organization "${args.organization}" could not be queried (${label}): ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

function keepEnabled(repositories: RepositoryRef[], logger: Logger): RepoTarget[] {
  const targets: RepoTarget[] = [];
  for (const repository of repositories) {
    const target = toRepoTarget(repository);
    if (repository.disabled) {
      logger.warn(`Skipping disabled or archived repository ${formatTarget(target)}`);
      continue;
    }
    targets.push(target);
  }
  return targets;
}

async function resolveEntry(args: ResolveArgs, entry: ScopeEntry): Promise<RepoTarget[]> {
  const { client, organization, logger } = args;

  if (!entry.repository) {
    const repositories = await lookup(
      args,
      `list repositories of ${entry.project}`,
      `Project "${entry.project}" was not found in organization "${organization}".`,
      () => client.listRepositories(entry.project)
    );
    return keepEnabled(repositories, logger);
  }

  const repositoryName = entry.repository;
  const repository = await lookup(
    args,
    `get repository ${entry.project}/${repositoryName}`,
    `Repository "${repositoryName}" was not found in project "${entry.project}" of organization "${organization}".`,
    () => client.getRepository(entry.project, repositoryName)
  );
  return keepEnabled([repository], logger);
}

export async function resolveScope(args: ResolveArgs): Promise<RepoTarget[]> {
  const { client, organization, scope, logger } = args;

  if (scope.kind === "subset") {
    const targets: RepoTarget[] = [];
    for (const entry of scope.entries) {
      targets.push(...(await resolveEntry(args, entry)));
    }
    return dedupeTargets(targets);
  }

  const projects = await lookup(
    args,
    "list projects",
    `Organization "${organization}" was not found.`,
    () => client.listProjects()
  );

  const targets: RepoTarget[] = [];
  for (const project of projects) {
    const repositories = await lookup(
      args,
      `list repositories of ${project.name}`,
      `Project "${project.name}" disappeared while resolving organization "${organization}".`,
      () => client.listRepositories(project.name)
    );
    targets.push(...keepEnabled(repositories, logger));
  }

  logger.debug(`Scope covers ${projects.length} project(s) in ${organization}`);
  return dedupeTargets(targets);
}
