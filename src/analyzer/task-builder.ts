import { parseTaskSettings } from '../boundaries/config-loader';
import { normJoin } from '../container/entry-path';
import { MissingLanguageError } from '../errors/index';
import { HierarchyType } from '../schemas/config-schemas';
import { substitutePlaceholder } from './placeholder';
import type { MatchedUnit, Task } from './types';

export interface TaskBuildContext {
  // Configuration string the task is created from
  configString: string;
  outputRoot: string;
  outputHierarchyType: HierarchyType;
  // Fallback when the configuration string carries no language at all
  jobLanguage?: string | undefined;
}

/**
 * Path of the sync map inside the output container. A paged output gives
 * each task its own directory, named after the identifier.
 */
export function computeSyncMapFilePath(
  outputRoot: string,
  hierarchyType: HierarchyType,
  identifier: string,
  fileName: string
): string {
  return normJoin(
    substitutePlaceholder(outputRoot, identifier),
    hierarchyType === HierarchyType.Paged ? identifier : undefined,
    substitutePlaceholder(fileName, identifier)
  );
}

export function buildTask(unit: MatchedUnit, context: TaskBuildContext): Task {
  const settings = parseTaskSettings(context.configString);
  const identifier = unit.identifier;

  const language = settings.language ?? settings.jobLanguage ?? context.jobLanguage;
  if (language === undefined) {
    throw new MissingLanguageError(identifier);
  }

  return Object.freeze({
    identifier,
    description: `Task ${identifier}`,
    language,
    textFilePath: unit.textPath,
    audioFilePath: unit.audioPath,
    syncMapFilePath: computeSyncMapFilePath(
      context.outputRoot,
      context.outputHierarchyType,
      identifier,
      settings.outputFileName
    ),
    textFileFormat: settings.textFileFormat,
    syncMapFileFormat: settings.outputFileFormat,
    smilAudioRef: substitutePlaceholder(settings.smilAudioRef, identifier),
    smilPageRef: substitutePlaceholder(settings.smilPageRef, identifier),
    configString: context.configString,
  });
}
