/**
 * Server Configuration and Startup Checks
 *
 * Builds the immutable ServerConfig from the environment and reports the
 * workbook state at startup.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { z } from 'zod';
import * as path from 'path';
import { existsSync } from 'fs';
import { configurationError } from './errors.js';
import type { ServerConfig } from './types.js';

/** Workbook location when NOTICE_EVAL_WORKBOOK_PATH is unset */
export const DEFAULT_WORKBOOK_PATH = './data/notices-testing.db';

const EnvSchema = z.object({
  NOTICE_EVAL_WORKBOOK_PATH: z
    .string()
    .trim()
    .min(1, 'NOTICE_EVAL_WORKBOOK_PATH must not be empty')
    .refine((p) => !p.includes('\0'), 'NOTICE_EVAL_WORKBOOK_PATH contains a null byte')
    .optional(),
});

/**
 * Validate the environment and build the server configuration.
 * Relative paths resolve against the working directory.
 *
 * @throws MCPError (CONFIGURATION_ERROR) when a variable is invalid
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const messages = parsed.error.errors.map((e) => e.message);
    throw configurationError(`Invalid configuration: ${messages.join('; ')}`, {
      variables: parsed.error.errors.map((e) => e.path.join('.')),
    });
  }

  const configured = parsed.data.NOTICE_EVAL_WORKBOOK_PATH;
  const config: ServerConfig = {
    workbookPath: path.resolve(configured ?? DEFAULT_WORKBOOK_PATH),
    workbookPathSource: configured ? 'env' : 'default',
  };
  return Object.freeze(config);
}

/**
 * Log the resolved configuration. A missing workbook is a warning only:
 * queries read as empty until eval_workbook_init or the first upsert.
 */
export function reportStartupState(config: ServerConfig): void {
  console.error(`[Config] Workbook path (${config.workbookPathSource}): ${config.workbookPath}`);
  if (!existsSync(config.workbookPath)) {
    console.error(
      '[WARN] Workbook does not exist yet. Queries return empty results until ' +
        'eval_workbook_init or eval_result_upsert creates it.'
    );
  }
}
