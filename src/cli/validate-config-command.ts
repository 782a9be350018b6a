import type { Command } from 'commander';
import { loadConfigFile, type NormalizedConfiguration } from '../boundaries/config-loader';
import { parseValidateConfigOptions } from '../boundaries/index';
import { ConfigError, handleUnknownError } from '../errors/index';
import { error as logError, log } from '../output/logger';
import { printConfiguration, printValidationRow } from '../output/reporter';
import { ExitCode, OutputFormat } from './types';

export function runValidateConfigCommand(filePath: string, rawOpts: unknown): ExitCode {
  let outputFormat: OutputFormat;
  try {
    const options = parseValidateConfigOptions(rawOpts);
    outputFormat = options.output === 'json' ? OutputFormat.Json : OutputFormat.Line;
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing validate-config command options');
    logError(`Error: ${err.message}`);
    return ExitCode.Failure;
  }

  let config: NormalizedConfiguration;
  try {
    config = loadConfigFile(filePath);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Validating configuration');
    if (outputFormat === OutputFormat.Json) {
      const issues = err instanceof ConfigError && err.issues.length > 0 ? err.issues : [err.message];
      console.log(JSON.stringify({ file: filePath, valid: false, issues }, null, 2));
    } else if (err instanceof ConfigError && err.issues.length > 0) {
      for (const issue of err.issues) printValidationRow('error', issue);
      log(`\n✖ ${err.issues.length} error(s) in ${filePath}.`);
    } else {
      logError(`Error: ${err.message}`);
    }
    return ExitCode.Failure;
  }

  if (outputFormat === OutputFormat.Json) {
    console.log(JSON.stringify({ file: filePath, valid: true, syntax: config.syntax, job: config.job }, null, 2));
  } else {
    printConfiguration(filePath, config);
    log(`\n✓ ${filePath} is valid.`);
  }
  return ExitCode.Success;
}

/*
 * Registers the 'validate-config' command with Commander.
 * This command checks a standalone config.txt or config.xml without a container.
 */
export function registerValidateConfigCommand(program: Command): void {
  program
    .command('validate-config')
    .description('Validate a config.txt or config.xml file')
    .argument('<file>', 'configuration file to validate')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .action((filePath: string, rawOpts: unknown) => {
      process.exit(runValidateConfigCommand(filePath, rawOpts));
    });
}
