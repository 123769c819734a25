// pattern: Functional Core
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { DigestRunner } from "../digest/orchestrator";

/**
 * Context shared by the tRPC procedures and the plain express routes.
 */
export type AppContext = {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly runner: DigestRunner;
};
