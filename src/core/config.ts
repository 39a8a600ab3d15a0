import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import { DEFAULT_RETRY_POLICY } from "./retry.js";
import type { RuleSet, RunConfig, Scope, ScopeEntry } from "./types.js";

export const DEFAULT_SETTINGS_PATH = "settings.yaml";
export const DEFAULT_AZURE_DEVOPS_URL = "https://dev.azure.com";
const DEFAULT_MAX_FILE_BYTES = 5 * 1024 * 1024;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const scopeEntrySchema = z.object({
  project: z.string().trim().min(1),
  repo: z.string().trim().min(1).optional(),
});

/** Project map layout: `{ ProjectA: [repo1, repo2], ProjectB: null }`. */
const scopeMapSchema = z.record(z.union([z.array(z.string().trim().min(1)), z.string().trim().min(1), z.null()]));

const settingsSchema = z.object({
  platform: z.enum(["azure-devops", "github"]).default("azure-devops"),
  organization_name: z.string().trim().min(1),
  base_url: z.string().url().optional(),
  /** Older settings files use these names. */
  ado_base_url: z.string().url().optional(),
  new_branch: z.string().trim().min(1).optional(),
  projects_and_repos: z.union([z.array(scopeEntrySchema), scopeMapSchema, z.null()]).optional(),
  strings_to_replace: z
    .array(
      z.object({
        old: z.string().min(1, "old must not be empty"),
        new: z.string(),
      })
    )
    .default([]),
  dry_run: z.boolean().default(false),
  commit_message: z.string().trim().min(1).optional(),
  include_paths: z.array(z.string()).default([]),
  exclude_paths: z.array(z.string()).default([]),
  max_file_bytes: z.number().int().positive().default(DEFAULT_MAX_FILE_BYTES),
  delivery: z
    .object({
      mode: z.enum(["direct", "pull-request"]).default("direct"),
      branch_name: z.string().trim().min(1).optional(),
      title: z.string().trim().min(1).optional(),
      description: z.string().optional(),
    })
    .default({}),
  concurrency: z
    .object({
      repositories: z.number().int().min(1).max(32).default(4),
      files: z.number().int().min(1).max(32).default(4),
    })
    .default({}),
  retry: z
    .object({
      max_attempts: z.number().int().min(1).max(10).default(DEFAULT_RETRY_POLICY.maxAttempts),
      base_delay_ms: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.baseDelayMs),
      max_delay_ms: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxDelayMs),
      jitter: z.number().min(0).max(1).default(DEFAULT_RETRY_POLICY.jitter),
    })
    .default({}),
  request_timeout_ms: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
});

export type Settings = z.infer<typeof settingsSchema>;

function formatDate(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

export function defaultWorkBranch(now: Date = new Date()): string {
  return `bulk-update-${formatDate(now)}`;
}

function toScope(raw: Settings["projects_and_repos"]): Scope {
  if (!raw) return { kind: "all" };

  const entries: ScopeEntry[] = [];
  if (Array.isArray(raw)) {
    for (const entry of raw) entries.push({ project: entry.project, repository: entry.repo });
  } else {
    for (const [project, repos] of Object.entries(raw)) {
      if (repos === null) entries.push({ project });
      else if (typeof repos === "string") entries.push({ project, repository: repos });
      else if (repos.length === 0) entries.push({ project });
      else for (const repository of repos) entries.push({ project, repository });
    }
  }

  return entries.length === 0 ? { kind: "all" } : { kind: "subset", entries };
}

function describeRules(settings: Settings): string {
  return settings.strings_to_replace.map((rule) => `"${rule.old}" -> "${rule.new}"`).join(", ");
}

export function toRunConfig(settings: Settings, now: Date = new Date()): RunConfig {
  const rules = settings.strings_to_replace.map((rule) => ({ search: rule.old, replace: rule.new }));
  const commitMessage = settings.commit_message ?? `Bulk update: replace ${describeRules(settings)}`;

  return {
    platform: settings.platform,
    organization: settings.organization_name,
    baseUrl:
      settings.base_url ??
      settings.ado_base_url ??
      (settings.platform === "azure-devops" ? DEFAULT_AZURE_DEVOPS_URL : undefined),
    scope: toScope(settings.projects_and_repos),
    rules,
    dryRun: settings.dry_run,
    delivery:
      settings.delivery.mode === "direct"
        ? { mode: "direct" }
        : {
            mode: "pull-request",
            branchName: settings.delivery.branch_name ?? settings.new_branch ?? defaultWorkBranch(now),
            title: settings.delivery.title ?? "Bulk update",
            description: settings.delivery.description ?? `Automated bulk replacement: ${describeRules(settings)}`,
          },
    commitMessage,
    pathFilter: { include: settings.include_paths, exclude: settings.exclude_paths },
    maxFileBytes: settings.max_file_bytes,
    concurrency: settings.concurrency,
    retry: {
      maxAttempts: settings.retry.max_attempts,
      baseDelayMs: settings.retry.base_delay_ms,
      maxDelayMs: settings.retry.max_delay_ms,
      jitter: settings.retry.jitter,
    },
    requestTimeoutMs: settings.request_timeout_ms,
  };
}

function toIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/** Validates a settings document without requiring replacement rules. */
export function parseSettingsDocument(raw: unknown): Settings {
  const parsed = settingsSchema.safeParse(raw ?? {});
  if (!parsed.success) throw new ConfigurationError("Invalid settings.", toIssues(parsed.error));
  return parsed.data;
}

export function parseSettings(raw: unknown, now?: Date): RunConfig {
  const settings = parseSettingsDocument(raw);
  if (settings.strings_to_replace.length === 0) {
    throw new ConfigurationError("Invalid settings.", ["strings_to_replace: at least one replacement is required"]);
  }
  return toRunConfig(settings, now);
}

export async function readSettingsFile(path: string = DEFAULT_SETTINGS_PATH): Promise<Settings> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Could not read settings file ${path}: ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigurationError(`Settings file ${path} is not valid YAML: ${errorMessage(err)}`);
  }

  return parseSettingsDocument(raw);
}

export async function loadSettings(path: string = DEFAULT_SETTINGS_PATH, now?: Date): Promise<RunConfig> {
  const settings = await readSettingsFile(path);
  return parseSettings(settings, now);
}

/**
 * Run configuration for an ad hoc request on top of a settings file: the
 * request's rules replace the file's, and its scope does too when given.
 * Default commit message and pull request text follow the new rules.
 */
export function withRequest(
  settings: Settings,
  request: { rules: RuleSet; scope?: ScopeEntry[]; dryRun: boolean },
  now?: Date
): RunConfig {
  return toRunConfig(
    {
      ...settings,
      strings_to_replace: request.rules.map((rule) => ({ old: rule.search, new: rule.replace })),
      projects_and_repos: request.scope?.length
        ? request.scope.map((entry) => ({ project: entry.project, repo: entry.repository }))
        : settings.projects_and_repos,
      dry_run: request.dryRun,
    },
    now
  );
}
