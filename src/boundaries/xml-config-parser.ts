import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { ConfigError } from '../errors/index';
import type { RawConfig } from './config-string';

export interface XmlConfig {
  job: RawConfig;
  tasks: RawConfig[];
}

const TASK_PATH = 'job.tasks.task';

const PARSER = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (_tagName: string, jPath: string) => jPath === TASK_PATH,
});

const ELEMENT_SCHEMA = z.record(z.string(), z.unknown());

const DOCUMENT_SCHEMA = z.object({
  job: ELEMENT_SCHEMA,
});

const TASKS_SCHEMA = z.object({
  task: z.array(z.unknown()),
});

// Keeps the text-only children; nested elements are not configuration keys.
// A key given more than once is rejected.
function pickStringValues(element: Record<string, unknown>, scope: string): RawConfig {
  const pairs: Array<[string, string]> = [];
  const issues: string[] = [];
  for (const [key, value] of Object.entries(element)) {
    if (typeof value === 'string') {
      pairs.push([key, value]);
    } else if (Array.isArray(value) && value.some((item) => typeof item === 'string')) {
      issues.push(`${key}: repeated`);
    }
  }
  if (issues.length > 0) {
    throw new ConfigError(`Invalid ${scope} configuration: ${issues.join('; ')}`, issues);
  }
  return Object.fromEntries(pairs);
}

// An empty <task/> yields an empty mapping, rejected later by validation
function toTaskConfig(element: unknown, index: number): RawConfig {
  const parsed = ELEMENT_SCHEMA.safeParse(element);
  return parsed.success ? pickStringValues(parsed.data, `task #${index + 1}`) : {};
}

/**
 * Reads a config.xml document: the text children of `<job>` form the job
 * mapping, each `<job><tasks><task>` forms one task mapping, in document order.
 */
export function parseXmlConfig(raw: string): XmlConfig {
  const validation = XMLValidator.validate(raw);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new ConfigError(`Invalid XML configuration: ${msg} (line ${line})`);
  }

  const document = DOCUMENT_SCHEMA.safeParse(PARSER.parse(raw));
  if (!document.success) {
    throw new ConfigError('Invalid XML configuration: missing <job> root element');
  }

  const { tasks, ...job } = document.data.job;
  const tasksElement = TASKS_SCHEMA.safeParse(tasks);

  return {
    job: pickStringValues(job, 'job'),
    tasks: tasksElement.success ? tasksElement.data.task.map(toTaskConfig) : [],
  };
}
