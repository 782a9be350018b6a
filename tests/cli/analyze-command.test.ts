import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import stripAnsi from 'strip-ansi';
import { registerAnalyzeCommand, runAnalyzeCommand } from '../../src/cli/analyze-command';
import { ExitCode } from '../../src/cli/types';
import { setSilentMode, setVerboseMode } from '../../src/output/logger';
import { FLAT_CONFIG_LINES, FLAT_CONFIG_TXT } from '../fixtures/configs';

function writeFiles(root: string, files: Record<string, string>): void {
  for (const [name, content] of Object.entries(files)) {
    const target = path.join(root, name);
    mkdirSync(path.dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
}

function printedLines(spy: MockInstance<typeof console.log>): string[] {
  return spy.mock.calls.map((args) => stripAnsi(args.map(String).join(' ')));
}

describe('analyze command', () => {
  let tempDir: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'syncjob-analyze-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setSilentMode(false);
    setVerboseMode(false);
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should register analyze command', () => {
    const program = new Command();
    registerAnalyzeCommand(program);
    const command = program.commands.find((c) => c.name() === 'analyze');
    expect(command).toBeDefined();
    expect(command?.options.map((o) => o.name())).toEqual(['verbose', 'output', 'config-string']);
  });

  it('prints the job of a directory container', async () => {
    writeFiles(tempDir, {
      'config.txt': FLAT_CONFIG_TXT,
      'text/ch1.txt': 'one',
      'audio/ch1.mp3': 'one',
    });

    const code = await runAnalyzeCommand(tempDir, {}, {});

    expect(code).toBe(ExitCode.Success);
    const lines = printedLines(logSpy);
    expect(lines[0]).toBe(tempDir);
    expect(lines[1]).toBe('  Job (config.txt)');
    expect(lines).toContain('\n✓ 1 task(s), 0 warning(s).');
  });

  it('prints JSON when asked through the environment', async () => {
    writeFiles(tempDir, {
      'config.txt': FLAT_CONFIG_TXT,
      'text/ch1.txt': 'one',
      'audio/ch1.mp3': 'one',
    });

    const code = await runAnalyzeCommand(tempDir, {}, { SYNCJOB_OUTPUT: 'json' });

    expect(code).toBe(ExitCode.Success);
    expect(logSpy).toHaveBeenCalledTimes(1);
    const output: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(output).toMatchObject({
      source: tempDir,
      job: {
        syntax: 'simple',
        tasks: [{ identifier: 'ch1', syncMapFilePath: 'out/ch1.smil' }],
      },
      diagnostics: [],
    });
  });

  it('lets the command line override the environment', async () => {
    writeFiles(tempDir, { 'config.txt': FLAT_CONFIG_TXT });

    await runAnalyzeCommand(tempDir, { output: 'line' }, { SYNCJOB_OUTPUT: 'json' });

    expect(printedLines(logSpy)).toContain('  no tasks');
  });

  it('uses a configuration string instead of the container configuration', async () => {
    writeFiles(tempDir, { 'text/ch1.txt': 'one', 'audio/ch1.mp3': 'one' });

    const code = await runAnalyzeCommand(tempDir, { output: 'json', configString: FLAT_CONFIG_LINES.join('|') }, {});

    expect(code).toBe(ExitCode.Success);
    const output: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(output).toMatchObject({ job: { configString: FLAT_CONFIG_LINES.join('|') } });
  });

  it('returns a distinct code when there is no configuration', async () => {
    writeFiles(tempDir, { 'text/ch1.txt': 'one' });

    const code = await runAnalyzeCommand(tempDir, { output: 'json' }, {});

    expect(code).toBe(ExitCode.NoConfiguration);
    const output: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(output).toMatchObject({ job: null });
  });

  it('fails on a malformed configuration', async () => {
    writeFiles(tempDir, { 'config.txt': 'is_hierarchy_type=flat\n' });

    expect(await runAnalyzeCommand(tempDir, {}, {})).toBe(ExitCode.Failure);
    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^Error: Invalid job configuration: /));
  });

  it('fails on invalid options', async () => {
    expect(await runAnalyzeCommand(tempDir, { output: 'xml' }, {})).toBe(ExitCode.Failure);
  });

  it('fails on a missing container', async () => {
    expect(await runAnalyzeCommand(path.join(tempDir, 'missing'), {}, {})).toBe(ExitCode.Failure);
  });
});
