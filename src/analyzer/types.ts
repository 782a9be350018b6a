// Identifier plus the text and audio entries of one unit of work
export interface MatchedUnit {
  identifier: string;
  textPath: string;
  audioPath: string;
}

export type ConfigSyntax = 'simple' | 'structured';

export interface Task {
  readonly identifier: string;
  readonly description: string;
  readonly language: string;
  readonly textFilePath: string;
  readonly audioFilePath: string;
  readonly syncMapFilePath: string;
  readonly textFileFormat: string | undefined;
  readonly syncMapFileFormat: string | undefined;
  readonly smilAudioRef: string | undefined;
  readonly smilPageRef: string | undefined;
  readonly configString: string;
}

export interface Job {
  readonly syntax: ConfigSyntax;
  readonly configString: string;
  readonly description: string | undefined;
  readonly tasks: readonly Task[];
}

export enum DiagnosticKind {
  AmbiguousText = 'ambiguous-text',
  AmbiguousAudio = 'ambiguous-audio',
  IncompletePair = 'incomplete-pair',
  DuplicateKey = 'duplicate-key',
}

// Something the analysis skipped or overrode without failing
export interface AnalysisDiagnostic {
  kind: DiagnosticKind;
  message: string;
  entries: string[];
  directory?: string;
}
