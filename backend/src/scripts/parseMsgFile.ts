#!/usr/bin/env node
/**
 * Parse one Outlook .msg file and print the result as JSON.
 *
 * Usage:
 *   npm run parse:msg -- --file ./enquiry.msg --mode full
 *   npm run parse:msg -- --file ./enquiry.msg --skip-attachments
 *
 * Exits 1 when the file cannot be parsed.
 */

import logger from '../utils/logger';
import { config } from '../config';
import { loadParsingConfigFromEnv } from '../config/parsing';
import { createFileOperationsLogger } from '../utils/fileOperationsLogger';
import { BODY_CONTENT_MODES, BodyContentMode, isParseFailure } from '../parsing/types';
import { OrchestratorDependencies, parseMsgFile } from '../services/processing/MsgParsingOrchestrator';

export interface CliOptions {
  file?: string;
  mode: BodyContentMode;
  skipAttachments: boolean;
}

function isBodyContentMode(value: string): value is BodyContentMode {
  return BODY_CONTENT_MODES.some((mode) => mode === value);
}

function flagValue(argv: string[], index: number): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${argv[index]}`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { mode: 'snippet', skipAttachments: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--file') {
      options.file = flagValue(argv, i++);
    } else if (arg === '--mode') {
      const mode = flagValue(argv, i++);
      if (!isBodyContentMode(mode)) {
        throw new Error(`Unknown mode "${mode}" (expected ${BODY_CONTENT_MODES.join(', ')})`);
      }
      options.mode = mode;
    } else if (arg === '--skip-attachments') {
      options.skipAttachments = true;
    }
  }

  return options;
}

/**
 * Returns the process exit code.
 */
export async function main(options?: CliOptions, deps: OrchestratorDependencies = {}): Promise<number> {
  const cliOptions = options ?? parseArgs(process.argv.slice(2));
  if (!cliOptions.file) {
    logger.error('Missing --file <path>');
    return 1;
  }

  const result = await parseMsgFile(cliOptions.file, cliOptions.mode, cliOptions.skipAttachments, {
    config: loadParsingConfigFromEnv(),
    ...deps,
    fileLog: deps.fileLog ?? createFileOperationsLogger(config.logDir),
  });

  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  return isParseFailure(result) ? 1 : 0;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Failed to parse message file', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
}
