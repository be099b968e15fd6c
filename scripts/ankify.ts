/**
 * ankify: conversation trees -> study flashcards
 *
 * Examples:
 *   tsx scripts/ankify.ts --import conversations.json
 *   tsx scripts/ankify.ts --all --verbose
 *   tsx scripts/ankify.ts --generate
 */

import {
  AiSdkProvider,
  createConsoleLogger,
  executeFlashcardPipeline,
  loadConfig,
  describeError,
  PipelineError,
} from '../src/lib/flashcard-pipeline';
import { USAGE, needsProvider, parseCliArgs } from '../src/lib/flashcard-pipeline/cli';

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help || options.stages.length === 0) {
    console.log(USAGE);
    return options.help ? 0 : 1;
  }

  const config = loadConfig({
    configPath: options.configPath,
    overrides: options.verbose ? { verbose: true } : {},
  });
  const logger = createConsoleLogger(config.verbose);

  // Only build the client when a stage will call it, so --generate works offline
  const provider = needsProvider(options.stages, config.classifier.use_judge)
    ? new AiSdkProvider({ config: config.llm })
    : undefined;

  console.log('='.repeat(60));
  console.log(`ankify: ${options.stages.join(' -> ')}`);
  console.log('='.repeat(60));

  await executeFlashcardPipeline(
    { stages: options.stages, exportFile: options.exportFile },
    { config, logger, provider }
  );

  console.log('\n✨ Done');
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`\n❌ ${describeError(error)}`);
    if (error instanceof PipelineError && Object.keys(error.context).length > 0) {
      console.error(JSON.stringify(error.context, null, 2));
    }
    if (!(error instanceof PipelineError) && error instanceof Error) {
      console.error(error.stack);
    }
    process.exitCode = 1;
  }
);
