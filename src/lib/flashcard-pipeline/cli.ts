/**
 * Command-line argument handling for scripts/ankify.ts
 */

import { parseArgs } from 'node:util';
import type { PipelineStage } from './pipeline';
import { STAGE_ORDER } from './pipeline';
import { ConfigurationError, describeError } from './errors';

export const USAGE = `Usage: tsx scripts/ankify.ts [stages] [options]

Stages (run in this order when combined):
  --import <file>   Split a bulk conversations export into the data directory
  --extract         Extract Q&A candidates from the conversation trees
  --classify        Filter candidates with local rules and the judge
  --fix             Rewrite known incomplete questions
  --answers         Generate fresh answers for the final records
  --generate        Write flashcard files
  --all             extract, classify, fix and generate

Options:
  --config <path>   YAML configuration file (default: ./config.yaml if present)
  --verbose         Debug logging
  --help            Show this message`;

export const ALL_STAGES: readonly PipelineStage[] = ['extract', 'classify', 'fix', 'generate'];

export interface CliOptions {
  stages: PipelineStage[];
  exportFile?: string;
  configPath?: string;
  verbose: boolean;
  help: boolean;
}

const CLI_OPTIONS = {
  import: { type: 'string' },
  extract: { type: 'boolean', default: false },
  classify: { type: 'boolean', default: false },
  fix: { type: 'boolean', default: false },
  answers: { type: 'boolean', default: false },
  generate: { type: 'boolean', default: false },
  all: { type: 'boolean', default: false },
  config: { type: 'string' },
  verbose: { type: 'boolean', default: false },
  help: { type: 'boolean', default: false },
} as const;

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (error) {
    throw new ConfigurationError(describeError(error));
  }
}

/**
 * Parse argv (without the node and script entries).
 * Throws ConfigurationError on unknown flags or missing values.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);

  const requested = new Set<PipelineStage>();
  if (values.import !== undefined) requested.add('import');
  if (values.extract) requested.add('extract');
  if (values.classify) requested.add('classify');
  if (values.fix) requested.add('fix');
  if (values.answers) requested.add('answers');
  if (values.generate) requested.add('generate');
  if (values.all) ALL_STAGES.forEach((stage) => requested.add(stage));

  return {
    stages: STAGE_ORDER.filter((stage) => requested.has(stage)),
    exportFile: values.import,
    configPath: values.config,
    verbose: values.verbose === true,
    help: values.help === true,
  };
}

/**
 * Stages that call the external capability
 */
export function needsProvider(stages: readonly PipelineStage[], useJudge: boolean): boolean {
  return stages.some(
    (stage) => stage === 'extract' || stage === 'answers' || (stage === 'classify' && useJudge)
  );
}
