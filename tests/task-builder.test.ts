import { describe, it, expect } from 'vitest';
import { buildTask, computeSyncMapFilePath } from '../src/analyzer/task-builder';
import { MissingLanguageError } from '../src/errors/index';
import { HierarchyType } from '../src/schemas/config-schemas';
import { FLAT_CONFIG_LINES } from './fixtures/configs';

const UNIT = { identifier: 'ch1', textPath: 'text/ch1.txt', audioPath: 'audio/ch1.mp3' };

describe('computeSyncMapFilePath', () => {
  it('places the file directly under the root for a flat output', () => {
    expect(computeSyncMapFilePath('out', HierarchyType.Flat, 'ch1', '$PREFIX.smil')).toBe('out/ch1.smil');
  });

  it('adds a directory per task for a paged output', () => {
    expect(computeSyncMapFilePath('out', HierarchyType.Paged, 'p1', 'sync.smil')).toBe('out/p1/sync.smil');
  });

  it('substitutes the identifier in the root as well', () => {
    expect(computeSyncMapFilePath('$PREFIX/out', HierarchyType.Paged, 'p1', 'sync.smil')).toBe('p1/out/p1/sync.smil');
  });

  it('handles an empty root', () => {
    expect(computeSyncMapFilePath('.', HierarchyType.Flat, 'ch1', '$PREFIX.smil')).toBe('ch1.smil');
  });
});

describe('buildTask', () => {
  it('builds a task from the job configuration string', () => {
    const configString = FLAT_CONFIG_LINES.join('|');
    const task = buildTask(UNIT, {
      configString,
      outputRoot: 'out',
      outputHierarchyType: HierarchyType.Flat,
    });

    expect(task).toEqual({
      identifier: 'ch1',
      description: 'Task ch1',
      language: 'en',
      textFilePath: 'text/ch1.txt',
      audioFilePath: 'audio/ch1.mp3',
      syncMapFilePath: 'out/ch1.smil',
      textFileFormat: undefined,
      syncMapFileFormat: undefined,
      smilAudioRef: undefined,
      smilPageRef: undefined,
      configString,
    });
    expect(Object.isFrozen(task)).toBe(true);
  });

  it('prefers the task language over the job language', () => {
    const task = buildTask(UNIT, {
      configString: 'job_language=en|task_language=de|os_task_file_name=x.smil',
      outputRoot: 'out',
      outputHierarchyType: HierarchyType.Flat,
    });
    expect(task.language).toBe('de');
  });

  it('falls back to the language given by the caller', () => {
    const task = buildTask(UNIT, {
      configString: 'os_task_file_name=x.smil',
      outputRoot: 'out',
      outputHierarchyType: HierarchyType.Flat,
      jobLanguage: 'fr',
    });
    expect(task.language).toBe('fr');
  });

  it('fails when no language can be resolved', () => {
    expect(() =>
      buildTask(UNIT, {
        configString: 'os_task_file_name=x.smil',
        outputRoot: 'out',
        outputHierarchyType: HierarchyType.Flat,
      })
    ).toThrow(MissingLanguageError);
  });

  it('substitutes the identifier in the SMIL references', () => {
    const task = buildTask(UNIT, {
      configString:
        'job_language=en|os_task_file_name=$PREFIX.smil|os_task_file_format=smil|is_text_type=unparsed|' +
        'os_task_file_smil_audio_ref=../audio/$PREFIX.mp3|os_task_file_smil_page_ref=../text/$PREFIX.xhtml',
      outputRoot: 'out',
      outputHierarchyType: HierarchyType.Flat,
    });
    expect(task.smilAudioRef).toBe('../audio/ch1.mp3');
    expect(task.smilPageRef).toBe('../text/ch1.xhtml');
    expect(task.textFileFormat).toBe('unparsed');
    expect(task.syncMapFileFormat).toBe('smil');
  });
});
