/**
 * Injectable collaborators of the cleanup commands
 */

import { createAwsProvider, SessionProvider } from "../../aws";
import type { ConfirmFn } from "../../core";
import type { ICloudProvider, JanitorConfig } from "../../types";

export interface CommandDeps {
  createProvider?: (config: JanitorConfig) => ICloudProvider;
  confirm?: ConfirmFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export function createDefaultProvider(config: JanitorConfig): ICloudProvider {
  return createAwsProvider(new SessionProvider(config.credentials));
}
