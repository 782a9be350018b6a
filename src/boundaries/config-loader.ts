import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  SIMPLE_JOB_SCHEMA,
  STRUCTURED_JOB_SCHEMA,
  STRUCTURED_TASK_SCHEMA,
  TASK_SCHEMA,
  type JobSettings,
  type StructuredJobSettings,
  type StructuredTaskEntry,
  type TaskSettings,
} from '../schemas/config-schemas';
import { SIMPLE_CONFIG_FILENAME, STRUCTURED_CONFIG_FILENAME } from '../config/constants';
import { ConfigError, handleUnknownError } from '../errors/index';
import { configTextToString, parseConfigString, serializeConfig, type RawConfig } from './config-string';
import { parseXmlConfig } from './xml-config-parser';

export interface SimpleConfiguration {
  syntax: 'simple';
  raw: RawConfig;
  configString: string;
  job: JobSettings;
}

export interface StructuredTaskConfiguration {
  raw: RawConfig;
  configString: string;
  task: StructuredTaskEntry;
}

export interface StructuredConfiguration {
  syntax: 'structured';
  raw: RawConfig;
  configString: string;
  job: StructuredJobSettings;
  tasks: StructuredTaskConfiguration[];
}

export type NormalizedConfiguration = SimpleConfiguration | StructuredConfiguration;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const key = issue.path.join('.');
    return key ? `${key}: ${issue.message}` : issue.message;
  });
}

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: RawConfig, scope: string): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid ${scope} configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Validates a simple configuration string (`key=value|key=value`) for
 * discovery-based analysis. Required job keys must all be present.
 */
export function normalizeSimpleConfig(configString: string): SimpleConfiguration {
  const raw = parseConfigString(configString);
  return {
    syntax: 'simple',
    raw,
    configString,
    job: parseWith(SIMPLE_JOB_SCHEMA, raw, 'job'),
  };
}

/**
 * Validates the contents of a config.xml document. Each task mapping is kept
 * as is: absent task keys are resolved later against the job.
 */
export function normalizeStructuredConfig(contents: string): StructuredConfiguration {
  const xml = parseXmlConfig(contents);
  const job = parseWith(STRUCTURED_JOB_SCHEMA, xml.job, 'job');
  const tasks = xml.tasks.map((raw, index) => ({
    raw,
    configString: serializeConfig(raw),
    task: parseWith(STRUCTURED_TASK_SCHEMA, raw, `task #${index + 1}`),
  }));
  return {
    syntax: 'structured',
    raw: xml.job,
    configString: serializeConfig(xml.job),
    job,
    tasks,
  };
}

export function parseTaskSettings(configString: string): TaskSettings {
  return parseWith(TASK_SCHEMA, parseConfigString(configString), 'task');
}

/**
 * Load and validate a standalone config.txt or config.xml file
 */
export function loadConfigFile(filePath: string, cwd: string = process.cwd()): NormalizedConfiguration {
  const fullPath = path.resolve(cwd, filePath);
  if (!existsSync(fullPath)) {
    throw new ConfigError(`Missing configuration file at ${fullPath}`);
  }

  let contents: string;
  try {
    contents = readFileSync(fullPath, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading config file');
    throw new ConfigError(`Failed to read config file: ${err.message}`);
  }

  const baseName = path.basename(fullPath).toLowerCase();
  if (baseName === STRUCTURED_CONFIG_FILENAME || path.extname(baseName) === '.xml') {
    return normalizeStructuredConfig(contents);
  }
  if (baseName === SIMPLE_CONFIG_FILENAME || path.extname(baseName) === '.txt') {
    return normalizeSimpleConfig(configTextToString(contents));
  }
  throw new ConfigError(`Unsupported configuration file '${baseName}': expected ${SIMPLE_CONFIG_FILENAME} or ${STRUCTURED_CONFIG_FILENAME}`);
}
