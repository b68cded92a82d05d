import { ArgumentError, errorMessage } from '../errors.js';
import { getLogger, initializeLogger } from '../utils/logger.js';

export interface ScriptDefinition<TOptions extends { help: boolean }> {
  name: string;
  parseArgs: (args: readonly string[]) => TOptions;
  printHelp: () => void;
  run: (options: TOptions) => Promise<unknown>;
}

/**
 * Parse flags and run the script. Resolves to the process exit code;
 * failures are logged to stderr and give 1.
 */
export async function executeScript<TOptions extends { help: boolean }>(
  script: ScriptDefinition<TOptions>,
  args: readonly string[]
): Promise<number> {
  try {
    const options = script.parseArgs(args);
    if (options.help) {
      script.printHelp();
      return 0;
    }

    const logger = await initializeLogger({ scriptName: script.name });
    await script.run(options);
    await logger.close();
    return 0;
  } catch (error) {
    const logger = getLogger();
    logger.error(errorMessage(error));
    if (error instanceof ArgumentError) {
      logger.output('Run with --help for usage.');
    }
    await logger.close();
    return 1;
  }
}

/**
 * Shared entry point for the bin scripts
 */
export function runScript<TOptions extends { help: boolean }>(script: ScriptDefinition<TOptions>): void {
  executeScript(script, process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`Fatal error: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  );
}
