import type { Command } from 'commander';
import { ContainerAnalyzer } from '../analyzer/container-analyzer';
import type { AnalysisDiagnostic, Job } from '../analyzer/types';
import { parseAnalyzeOptions, parseEnvironment } from '../boundaries/index';
import { LOG_PREFIX } from '../config/constants';
import { openContainer } from '../container/container-factory';
import type { Container } from '../container/types';
import { handleUnknownError } from '../errors/index';
import { JobJsonFormatter } from '../output/json-formatter';
import { error as logError, setSilentMode, setVerboseMode, warn } from '../output/logger';
import { printDiagnostics, printJobHeader, printJobSummary, printTaskRows } from '../output/reporter';
import { ExitCode, OutputFormat } from './types';

/*
 * Runs the analyze command and returns its exit code.
 * CLI flags win over SYNCJOB_* environment variables.
 */
export async function runAnalyzeCommand(
  containerPath: string,
  rawOpts: unknown,
  env: unknown = process.env
): Promise<ExitCode> {
  let outputFormat: OutputFormat;
  let configString: string | undefined;
  try {
    const options = parseAnalyzeOptions(rawOpts);
    const environment = parseEnvironment(env);
    outputFormat = (options.output ?? environment.SYNCJOB_OUTPUT) === 'json' ? OutputFormat.Json : OutputFormat.Line;
    setVerboseMode(options.verbose ?? environment.SYNCJOB_VERBOSE);
    configString = options.configString;
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing analyze command options');
    logError(`Error: ${err.message}`);
    return ExitCode.Failure;
  }
  setSilentMode(outputFormat === OutputFormat.Json);

  let container: Container;
  try {
    container = await openContainer(containerPath);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Opening container');
    logError(`Error: ${err.message}`);
    return ExitCode.Failure;
  }

  const jsonFormatter = new JobJsonFormatter(container.source);
  const diagnostics: AnalysisDiagnostic[] = [];
  const analyzer = new ContainerAnalyzer(container, {
    onDiagnostic: (diagnostic) => {
      diagnostics.push(diagnostic);
      jsonFormatter.addDiagnostic(diagnostic);
    },
  });

  let job: Job | null;
  try {
    job = configString !== undefined ? analyzer.analyzeConfigString(configString) : analyzer.analyze();
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Analyzing container');
    logError(`Error: ${err.message}`);
    return ExitCode.Failure;
  }

  if (outputFormat === OutputFormat.Json) {
    console.log(jsonFormatter.toJson(job));
  } else if (job) {
    printJobHeader(container.source, job);
    printTaskRows(job);
    printDiagnostics(diagnostics);
    printJobSummary(job, diagnostics);
  }

  if (!job) {
    warn(`${LOG_PREFIX} No config.txt or config.xml found in ${container.source}`);
    return ExitCode.NoConfiguration;
  }
  return ExitCode.Success;
}

/*
 * Registers the 'analyze' command with Commander.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Analyze a container and print the job it describes')
    .argument('<container>', 'directory, .zip or .epub container')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--output <format>', 'Output format: line (default) or json')
    .option('--config-string <string>', 'Use this configuration string instead of the container configuration')
    .action(async (containerPath: string, rawOpts: unknown) => {
      process.exit(await runAnalyzeCommand(containerPath, rawOpts));
    });
}
