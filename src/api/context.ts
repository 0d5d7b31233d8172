// pattern: Functional Core
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { ContentStore } from "../db/store";

/**
 * tRPC context passed to all procedures: the content store, the loaded
 * configuration and the structured logger.
 */
export type AppContext = {
  readonly store: ContentStore;
  readonly config: AppConfig;
  readonly logger: Logger;
};
