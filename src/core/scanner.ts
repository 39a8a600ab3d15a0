import type { PipelineContext } from "./context.js";
import { AuthenticationError, RunCancelledError, errorMessage } from "./errors.js";
import { matchesPathFilter } from "./paths.js";
import { formatTarget, type FileContent, type RepoFile } from "./platform.js";
import { WorkerPool } from "./pool.js";
import { applyRules, containsAnySearch } from "./rules.js";
import { looksBinaryText } from "./text.js";
import type { FileError, FileMatch, RepoTarget, ScanResult, SkippedFile } from "./types.js";

type FileScan =
  | { kind: "match"; match: FileMatch }
  | { kind: "clean" }
  | { kind: "skipped"; skipped: SkippedFile }
  | { kind: "error"; error: FileError };

async function scanFile(ctx: PipelineContext, target: RepoTarget, file: RepoFile, head: string): Promise<FileScan> {
  const { client, config, call } = ctx;

  let content: FileContent;
  try {
    content = await call(`read ${formatTarget(target)}:${file.path}`, () => client.readFile(target, file, head));
  } catch (err) {
    // A credential problem will hit every file; fail the repository instead.
    if (err instanceof AuthenticationError || err instanceof RunCancelledError) throw err;
    return { kind: "error", error: { path: file.path, message: errorMessage(err) } };
  }

  if (content.kind === "binary") return { kind: "skipped", skipped: { path: file.path, reason: "binary" } };
  if (content.kind === "unsupported-encoding") {
    return { kind: "skipped", skipped: { path: file.path, reason: "unsupported-encoding" } };
  }
  if (looksBinaryText(content.content)) return { kind: "skipped", skipped: { path: file.path, reason: "binary" } };
  // Listings do not always carry sizes.
  if (file.size === undefined && new TextEncoder().encode(content.content).byteLength > config.maxFileBytes) {
    return { kind: "skipped", skipped: { path: file.path, reason: "too-large" } };
  }

  if (!containsAnySearch(content.content, config.rules)) return { kind: "clean" };

  const applied = applyRules(content.content, config.rules);
  return {
    kind: "match",
    match: {
      target,
      path: file.path,
      originalContent: content.content,
      newContent: applied.content,
      matchCount: applied.matchCount,
    },
  };
}

export async function scanRepository(ctx: PipelineContext, target: RepoTarget): Promise<ScanResult> {
  const { client, config, call, logger } = ctx;
  const label = formatTarget(target);

  const repository = await call(`get repository ${label}`, () =>
    client.getRepository(target.projectName, target.repositoryName)
  );
  const branch = repository.defaultBranch;
  const empty: ScanResult = { target, branch, head: null, matches: [], fileErrors: [], skippedFiles: [] };
  if (!branch) {
    logger.info(`${label} has no default branch; nothing to scan`);
    return empty;
  }

  const head = await call(`get head of ${label}@${branch}`, () => client.getBranchHead(target, branch));
  if (!head) {
    logger.info(`${label} branch ${branch} has no commits; nothing to scan`);
    return empty;
  }

  const listed = await call(`list files of ${label}@${branch}`, () => client.listFiles(target, head));

  const skippedFiles: SkippedFile[] = [];
  const candidates: RepoFile[] = [];
  for (const file of listed) {
    if (!matchesPathFilter(file.path, config.pathFilter)) continue;
    if (file.isBinary) {
      skippedFiles.push({ path: file.path, reason: "binary" });
    } else if (file.size !== undefined && file.size > config.maxFileBytes) {
      skippedFiles.push({ path: file.path, reason: "too-large" });
    } else {
      candidates.push(file);
    }
  }

  const pool = new WorkerPool(config.concurrency.files);
  const scans = await pool.map(candidates, (file) => scanFile(ctx, target, file, head));

  const matches: FileMatch[] = [];
  const fileErrors: FileError[] = [];
  for (const scan of scans) {
    if (scan.kind === "match") matches.push(scan.match);
    else if (scan.kind === "skipped") skippedFiles.push(scan.skipped);
    else if (scan.kind === "error") fileErrors.push(scan.error);
  }

  for (const skipped of skippedFiles) {
    logger.debug(`${label}: skipped ${skipped.path} (${skipped.reason})`);
  }
  for (const fileError of fileErrors) {
    logger.warn(`${label}: could not read ${fileError.path}: ${fileError.message}`);
  }
  logger.debug(`${label}: scanned ${candidates.length} file(s), ${matches.length} with matches`);

  return { target, branch, head, matches, fileErrors, skippedFiles };
}
