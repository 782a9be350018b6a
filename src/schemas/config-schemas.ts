import { z } from 'zod';
import { isValidPattern } from '../config/patterns';

export enum HierarchyType {
  Flat = 'flat',
  Paged = 'paged',
}

// Keys of the configuration vocabulary, as written in config.txt / config.xml
export enum ConfigKey {
  JOB_LANGUAGE = 'job_language',
  JOB_DESCRIPTION = 'job_description',
  IS_HIERARCHY_TYPE = 'is_hierarchy_type',
  IS_HIERARCHY_PREFIX = 'is_hierarchy_prefix',
  IS_TASK_DIRECTORY_NAME_REGEX = 'is_task_directory_name_regex',
  IS_TEXT_FILE_RELATIVE_PATH = 'is_text_file_relative_path',
  IS_TEXT_FILE_NAME_REGEX = 'is_text_file_name_regex',
  IS_AUDIO_FILE_RELATIVE_PATH = 'is_audio_file_relative_path',
  IS_AUDIO_FILE_NAME_REGEX = 'is_audio_file_name_regex',
  OS_JOB_FILE_NAME = 'os_job_file_name',
  OS_JOB_FILE_CONTAINER = 'os_job_file_container',
  OS_JOB_FILE_HIERARCHY_TYPE = 'os_job_file_hierarchy_type',
  OS_JOB_FILE_HIERARCHY_PREFIX = 'os_job_file_hierarchy_prefix',
  TASK_LANGUAGE = 'task_language',
  TASK_DESCRIPTION = 'task_description',
  TASK_CUSTOM_ID = 'task_custom_id',
  IS_TEXT_FILE = 'is_text_file',
  IS_TEXT_TYPE = 'is_text_type',
  IS_AUDIO_FILE = 'is_audio_file',
  OS_TASK_FILE_NAME = 'os_task_file_name',
  OS_TASK_FILE_FORMAT = 'os_task_file_format',
  OS_TASK_FILE_SMIL_AUDIO_REF = 'os_task_file_smil_audio_ref',
  OS_TASK_FILE_SMIL_PAGE_REF = 'os_task_file_smil_page_ref',
}

const MISSING = { required_error: 'missing required key' };

// Empty values count as absent
const OPTIONAL_VALUE = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v === undefined || v.length === 0 ? undefined : v));

const REQUIRED_VALUE = z.string(MISSING).trim().min(1, { message: 'must not be empty' });

// Prefixes may be empty: the directory of the configuration entry
const PREFIX_VALUE = z.string(MISSING).trim();

const PATTERN_VALUE = REQUIRED_VALUE.refine(isValidPattern, (v) => ({
  message: `invalid regular expression '${v}'`,
}));

const HIERARCHY_TYPE_VALUE = z.string(MISSING).trim().toLowerCase().pipe(z.nativeEnum(HierarchyType));

// Job-scope keys of config.txt, where tasks are discovered from the entries
export const SIMPLE_JOB_SCHEMA = z
  .object({
    [ConfigKey.JOB_LANGUAGE]: OPTIONAL_VALUE,
    [ConfigKey.JOB_DESCRIPTION]: OPTIONAL_VALUE,
    [ConfigKey.IS_HIERARCHY_TYPE]: HIERARCHY_TYPE_VALUE,
    [ConfigKey.IS_HIERARCHY_PREFIX]: PREFIX_VALUE,
    [ConfigKey.IS_TASK_DIRECTORY_NAME_REGEX]: OPTIONAL_VALUE.refine(
      (v) => v === undefined || isValidPattern(v),
      { message: 'invalid regular expression' }
    ),
    [ConfigKey.IS_TEXT_FILE_RELATIVE_PATH]: OPTIONAL_VALUE,
    [ConfigKey.IS_TEXT_FILE_NAME_REGEX]: PATTERN_VALUE,
    [ConfigKey.IS_AUDIO_FILE_RELATIVE_PATH]: OPTIONAL_VALUE,
    [ConfigKey.IS_AUDIO_FILE_NAME_REGEX]: PATTERN_VALUE,
    [ConfigKey.OS_JOB_FILE_NAME]: OPTIONAL_VALUE,
    [ConfigKey.OS_JOB_FILE_CONTAINER]: OPTIONAL_VALUE,
    [ConfigKey.OS_JOB_FILE_HIERARCHY_TYPE]: HIERARCHY_TYPE_VALUE,
    [ConfigKey.OS_JOB_FILE_HIERARCHY_PREFIX]: PREFIX_VALUE,
    // Task-scope key shared by every discovered task
    [ConfigKey.OS_TASK_FILE_NAME]: REQUIRED_VALUE,
  })
  .superRefine((raw, ctx) => {
    if (
      raw[ConfigKey.IS_HIERARCHY_TYPE] === HierarchyType.Paged &&
      raw[ConfigKey.IS_TASK_DIRECTORY_NAME_REGEX] === undefined
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [ConfigKey.IS_TASK_DIRECTORY_NAME_REGEX],
        message: 'required when is_hierarchy_type is paged',
      });
    }
  })
  .transform((raw) => ({
    language: raw[ConfigKey.JOB_LANGUAGE],
    description: raw[ConfigKey.JOB_DESCRIPTION],
    hierarchyType: raw[ConfigKey.IS_HIERARCHY_TYPE],
    hierarchyPrefix: raw[ConfigKey.IS_HIERARCHY_PREFIX],
    taskDirectoryNameRegex: raw[ConfigKey.IS_TASK_DIRECTORY_NAME_REGEX],
    textFileRelativePath: raw[ConfigKey.IS_TEXT_FILE_RELATIVE_PATH],
    textFileNameRegex: raw[ConfigKey.IS_TEXT_FILE_NAME_REGEX],
    audioFileRelativePath: raw[ConfigKey.IS_AUDIO_FILE_RELATIVE_PATH],
    audioFileNameRegex: raw[ConfigKey.IS_AUDIO_FILE_NAME_REGEX],
    outputFileName: raw[ConfigKey.OS_JOB_FILE_NAME],
    outputContainer: raw[ConfigKey.OS_JOB_FILE_CONTAINER],
    outputHierarchyType: raw[ConfigKey.OS_JOB_FILE_HIERARCHY_TYPE],
    outputHierarchyPrefix: raw[ConfigKey.OS_JOB_FILE_HIERARCHY_PREFIX],
  }));

// Job-scope keys of config.xml, where tasks are listed explicitly
export const STRUCTURED_JOB_SCHEMA = z
  .object({
    [ConfigKey.JOB_LANGUAGE]: OPTIONAL_VALUE,
    [ConfigKey.JOB_DESCRIPTION]: OPTIONAL_VALUE,
    [ConfigKey.OS_JOB_FILE_NAME]: OPTIONAL_VALUE,
    [ConfigKey.OS_JOB_FILE_CONTAINER]: OPTIONAL_VALUE,
    [ConfigKey.OS_JOB_FILE_HIERARCHY_TYPE]: HIERARCHY_TYPE_VALUE,
    [ConfigKey.OS_JOB_FILE_HIERARCHY_PREFIX]: PREFIX_VALUE,
  })
  .transform((raw) => ({
    language: raw[ConfigKey.JOB_LANGUAGE],
    description: raw[ConfigKey.JOB_DESCRIPTION],
    outputFileName: raw[ConfigKey.OS_JOB_FILE_NAME],
    outputContainer: raw[ConfigKey.OS_JOB_FILE_CONTAINER],
    outputHierarchyType: raw[ConfigKey.OS_JOB_FILE_HIERARCHY_TYPE],
    outputHierarchyPrefix: raw[ConfigKey.OS_JOB_FILE_HIERARCHY_PREFIX],
  }));

const TASK_SHAPE = {
  [ConfigKey.JOB_LANGUAGE]: OPTIONAL_VALUE,
  [ConfigKey.TASK_LANGUAGE]: OPTIONAL_VALUE,
  [ConfigKey.TASK_DESCRIPTION]: OPTIONAL_VALUE,
  [ConfigKey.TASK_CUSTOM_ID]: z.string().trim().optional(),
  [ConfigKey.IS_TEXT_TYPE]: OPTIONAL_VALUE,
  [ConfigKey.OS_TASK_FILE_NAME]: REQUIRED_VALUE,
  [ConfigKey.OS_TASK_FILE_FORMAT]: OPTIONAL_VALUE,
  [ConfigKey.OS_TASK_FILE_SMIL_AUDIO_REF]: OPTIONAL_VALUE,
  [ConfigKey.OS_TASK_FILE_SMIL_PAGE_REF]: OPTIONAL_VALUE,
};

// Task-scope keys; a task built from config.txt sees the whole job mapping
export const TASK_SCHEMA = z.object(TASK_SHAPE).transform((raw) => ({
  language: raw[ConfigKey.TASK_LANGUAGE],
  jobLanguage: raw[ConfigKey.JOB_LANGUAGE],
  description: raw[ConfigKey.TASK_DESCRIPTION],
  customId: raw[ConfigKey.TASK_CUSTOM_ID],
  textFileFormat: raw[ConfigKey.IS_TEXT_TYPE],
  outputFileName: raw[ConfigKey.OS_TASK_FILE_NAME],
  outputFileFormat: raw[ConfigKey.OS_TASK_FILE_FORMAT],
  smilAudioRef: raw[ConfigKey.OS_TASK_FILE_SMIL_AUDIO_REF],
  smilPageRef: raw[ConfigKey.OS_TASK_FILE_SMIL_PAGE_REF],
}));

// A <task> of config.xml names its own text and audio entries
export const STRUCTURED_TASK_SCHEMA = z
  .object({
    ...TASK_SHAPE,
    [ConfigKey.IS_TEXT_FILE]: REQUIRED_VALUE,
    [ConfigKey.IS_AUDIO_FILE]: REQUIRED_VALUE,
  })
  .transform((raw) => ({
    customId: raw[ConfigKey.TASK_CUSTOM_ID] ?? '',
    textFilePath: raw[ConfigKey.IS_TEXT_FILE],
    audioFilePath: raw[ConfigKey.IS_AUDIO_FILE],
  }));

// Inferred types
export type JobSettings = z.infer<typeof SIMPLE_JOB_SCHEMA>;
export type StructuredJobSettings = z.infer<typeof STRUCTURED_JOB_SCHEMA>;
export type TaskSettings = z.infer<typeof TASK_SCHEMA>;
export type StructuredTaskEntry = z.infer<typeof STRUCTURED_TASK_SCHEMA>;
