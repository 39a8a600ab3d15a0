import type { Logger } from "@slack/logger";
import type { PlatformClient } from "./platform.js";
import type { CallRunner, Sleep } from "./retry.js";
import type { RunConfig } from "./types.js";

/** Everything one repository's pipeline needs. Shared read-only between workers. */
export type PipelineContext = {
  client: PlatformClient;
  config: RunConfig;
  call: CallRunner;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: Sleep;
};
