import { configTextToString } from '../boundaries/config-string';
import {
  normalizeSimpleConfig,
  normalizeStructuredConfig,
  type SimpleConfiguration,
} from '../boundaries/config-loader';
import { compilePattern } from '../config/patterns';
import { ConfigError } from '../errors/index';
import { entryDirname, normJoin } from '../container/entry-path';
import type { Container } from '../container/types';
import { consoleLogger, type Logger } from '../output/logger';
import { HierarchyType, type JobSettings } from '../schemas/config-schemas';
import { filterEntries, filterTarget } from './entry-filter';
import { pairFlatEntries } from './flat-pairer';
import { matchPagedDirectories } from './paged-matcher';
import { buildTask } from './task-builder';
import {
  DiagnosticKind,
  type AnalysisDiagnostic,
  type ConfigSyntax,
  type Job,
  type MatchedUnit,
  type Task,
} from './types';

export interface ContainerAnalyzerOptions {
  logger?: Logger | undefined;
  onDiagnostic?: ((diagnostic: AnalysisDiagnostic) => void) | undefined;
}

interface DiscoveryPatterns {
  text: RegExp;
  audio: RegExp;
}

function assembleJob(syntax: ConfigSyntax, configString: string, description: string | undefined, tasks: Task[]): Job {
  return Object.freeze({
    syntax,
    configString,
    description,
    tasks: Object.freeze(tasks),
  });
}

/**
 * Derives the Job of a container from its configuration: config.xml lists the
 * tasks explicitly, config.txt describes how to discover them in the entries.
 * Each call builds a new Job; the container is only read, never written.
 */
export class ContainerAnalyzer {
  private readonly logger: Logger;
  private readonly onDiagnostic: ((diagnostic: AnalysisDiagnostic) => void) | undefined;

  constructor(private readonly container: Container, options: ContainerAnalyzerOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.onDiagnostic = options.onDiagnostic;
  }

  /**
   * Returns null when the container holds no configuration. When both forms
   * are present, config.xml is used.
   */
  analyze(): Job | null {
    const structuredEntry = this.container.structuredConfigEntryPath();
    if (structuredEntry !== undefined) {
      this.logger.debug(`Analyzing container with XML config entry '${structuredEntry}'`);
      return this.analyzeStructured(this.readConfigEntry(structuredEntry), entryDirname(structuredEntry));
    }

    const simpleEntry = this.container.simpleConfigEntryPath();
    if (simpleEntry !== undefined) {
      this.logger.debug(`Analyzing container with TXT config entry '${simpleEntry}'`);
      const configString = configTextToString(this.readConfigEntry(simpleEntry));
      return this.analyzeSimple(configString, entryDirname(simpleEntry));
    }

    this.logger.debug(`No configuration file in ${this.container.source}, returning null`);
    return null;
  }

  /**
   * Analyzes the container with a configuration string supplied by the
   * caller instead of a config entry; paths resolve from the container root.
   */
  analyzeConfigString(configString: string): Job {
    this.logger.debug(`Analyzing container with config string '${configString}'`);
    return this.analyzeSimple(configString, '');
  }

  private readConfigEntry(entryPath: string): string {
    return new TextDecoder('utf-8').decode(this.container.readEntry(entryPath));
  }

  private analyzeSimple(configString: string, configDir: string): Job {
    const config = normalizeSimpleConfig(configString);
    const { job } = config;

    const tasksRoot = normJoin(configDir, job.hierarchyPrefix);
    const outputRoot = normJoin(configDir, job.outputHierarchyPrefix);
    this.logger.debug(`Tasks root directory: '${tasksRoot}', sync map root directory: '${outputRoot}'`);

    const patterns: DiscoveryPatterns = {
      text: compilePattern(job.textFileNameRegex),
      audio: compilePattern(job.audioFileNameRegex),
    };
    const entries = this.container.entries();

    const units =
      job.hierarchyType === HierarchyType.Paged
        ? this.collectPagedUnits(entries, tasksRoot, job, patterns)
        : this.collectFlatUnits(entries, tasksRoot, job, patterns);

    const tasks = units.map((unit) => this.createTask(unit, config, outputRoot));
    return assembleJob('simple', configString, job.description, tasks);
  }

  private createTask(unit: MatchedUnit, config: SimpleConfiguration, outputRoot: string): Task {
    this.logger.debug(`Creating task '${unit.identifier}': '${unit.textPath}' + '${unit.audioPath}'`);
    return buildTask(unit, {
      configString: config.configString,
      outputRoot,
      outputHierarchyType: config.job.outputHierarchyType,
      jobLanguage: config.job.language,
    });
  }

  private collectFlatUnits(
    entries: readonly string[],
    tasksRoot: string,
    job: JobSettings,
    patterns: DiscoveryPatterns
  ): MatchedUnit[] {
    const textFiles = filterEntries(entries, tasksRoot, job.textFileRelativePath, patterns.text);
    const audioFiles = filterEntries(entries, tasksRoot, job.audioFileRelativePath, patterns.audio);
    this.logger.debug(`Flat hierarchy: ${textFiles.length} text file(s), ${audioFiles.length} audio file(s)`);

    return pairFlatEntries(textFiles, audioFiles, {
      textRoot: filterTarget(tasksRoot, job.textFileRelativePath),
      audioRoot: filterTarget(tasksRoot, job.audioFileRelativePath),
      onDuplicateKey: ({ stream, key, discarded, kept }) =>
        this.report({
          kind: DiagnosticKind.DuplicateKey,
          message: `Duplicate ${stream} key '${key}': using '${kept}', ignoring '${discarded}'`,
          entries: [discarded, kept],
        }),
    });
  }

  private collectPagedUnits(
    entries: readonly string[],
    tasksRoot: string,
    job: JobSettings,
    patterns: DiscoveryPatterns
  ): MatchedUnit[] {
    if (job.taskDirectoryNameRegex === undefined) {
      throw new ConfigError('Invalid job configuration: is_task_directory_name_regex: required when is_hierarchy_type is paged');
    }
    const directoryPattern = compilePattern(job.taskDirectoryNameRegex);
    const directories = matchPagedDirectories(entries, tasksRoot, directoryPattern);
    this.logger.debug(`Paged hierarchy: matched directories ${JSON.stringify(directories)}`);

    const units: MatchedUnit[] = [];
    for (const directory of directories) {
      const directoryRoot = normJoin(tasksRoot, directory);
      const textFiles = filterEntries(entries, directoryRoot, job.textFileRelativePath, patterns.text);
      const audioFiles = filterEntries(entries, directoryRoot, job.audioFileRelativePath, patterns.audio);
      const [textPath] = textFiles;
      const [audioPath] = audioFiles;

      if (textFiles.length === 1 && audioFiles.length === 1 && textPath !== undefined && audioPath !== undefined) {
        units.push({ identifier: directory, textPath, audioPath });
      } else if (textFiles.length > 1) {
        this.report({
          kind: DiagnosticKind.AmbiguousText,
          message: `More than one text file in '${directory}', skipping it`,
          directory,
          entries: textFiles,
        });
      } else if (audioFiles.length > 1) {
        this.report({
          kind: DiagnosticKind.AmbiguousAudio,
          message: `More than one audio file in '${directory}', skipping it`,
          directory,
          entries: audioFiles,
        });
      } else if (textFiles.length + audioFiles.length > 0) {
        this.report({
          kind: DiagnosticKind.IncompletePair,
          message: `No ${textFiles.length === 0 ? 'text' : 'audio'} file in '${directory}', skipping it`,
          directory,
          entries: [...textFiles, ...audioFiles],
        });
      } else {
        this.logger.debug(`No text nor audio file in '${directory}'`);
      }
    }
    return units;
  }

  private analyzeStructured(contents: string, configDir: string): Job {
    const config = normalizeStructuredConfig(contents);
    const outputRoot = normJoin(configDir, config.job.outputHierarchyPrefix);
    this.logger.debug(`Sync map root directory: '${outputRoot}', ${config.tasks.length} task(s) declared`);

    const tasks = config.tasks.map(({ task, configString }) => {
      const unit: MatchedUnit = {
        identifier: task.customId,
        textPath: normJoin(configDir, task.textFilePath),
        audioPath: normJoin(configDir, task.audioFilePath),
      };
      this.logger.debug(`Creating task '${unit.identifier}': '${unit.textPath}' + '${unit.audioPath}'`);
      return buildTask(unit, {
        configString,
        outputRoot,
        outputHierarchyType: config.job.outputHierarchyType,
        jobLanguage: config.job.language,
      });
    });

    return assembleJob('structured', config.configString, config.job.description, tasks);
  }

  private report(diagnostic: AnalysisDiagnostic): void {
    this.logger.warn(diagnostic.message);
    this.onDiagnostic?.(diagnostic);
  }
}
