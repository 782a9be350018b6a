import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import type { AnalysisDiagnostic, Job } from '../analyzer/types';
import type { NormalizedConfiguration } from '../boundaries/config-loader';

// Pads by visible width so coloured cells stay aligned
function padCell(text: string, width: number): string {
  const visible = stripAnsi(text).length;
  return visible >= width ? text : text + ' '.repeat(width - visible);
}

export function printJobHeader(source: string, job: Job) {
  const syntax = job.syntax === 'structured' ? 'config.xml' : 'config.txt';
  console.log(chalk.underline(source));
  const description = job.description ? ` ${chalk.cyan(job.description)}` : '';
  console.log(`  ${chalk.bold('Job')}${description} ${chalk.gray(`(${syntax})`)}`);
}

export function printTaskRows(job: Job) {
  if (job.tasks.length === 0) {
    console.log(`  ${chalk.yellow('no tasks')}`);
    return;
  }
  const idWidth = Math.max(4, ...job.tasks.map((t) => t.identifier.length)) + 2;
  for (const task of job.tasks) {
    const id = padCell(chalk.cyan(task.identifier || '""'), idWidth);
    const lang = padCell(chalk.magenta(task.language), 6);
    console.log(`  ${id}${lang}${task.textFilePath} + ${task.audioFilePath} ${chalk.gray('->')} ${task.syncMapFilePath}`);
  }
}

export function printDiagnostics(diagnostics: readonly AnalysisDiagnostic[]) {
  for (const diagnostic of diagnostics) {
    const label = padCell(chalk.yellow('warning'), 9);
    console.log(`  ${label}${diagnostic.message} ${chalk.gray(diagnostic.kind)}`);
  }
}

export function printJobSummary(job: Job, diagnostics: readonly AnalysisDiagnostic[]) {
  const mark = job.tasks.length > 0 ? chalk.green('✓') : chalk.yellow('!');
  console.log(`\n${mark} ${job.tasks.length} task(s), ${diagnostics.length} warning(s).`);
}

export function printValidationRow(level: 'error' | 'warning', message: string) {
  const label = level === 'error' ? chalk.red('error') : chalk.yellow('warning');
  console.log(`  ${padCell(label, 9)}${message}`);
}

export function printConfiguration(filePath: string, config: NormalizedConfiguration) {
  console.log(chalk.underline(filePath));
  const settings = Object.entries(config.job).filter(
    (pair): pair is [string, string] => typeof pair[1] === 'string'
  );
  const keyWidth = Math.max(...settings.map(([key]) => key.length)) + 2;
  for (const [key, value] of settings) {
    console.log(`  ${padCell(chalk.cyan(key), keyWidth)}${value}`);
  }
  if (config.syntax === 'structured') {
    console.log(`  ${padCell(chalk.cyan('tasks'), keyWidth)}${config.tasks.length}`);
  }
}
