import type { AnalysisDiagnostic, Job } from '../analyzer/types';
import { VERSION } from '../config/package-info';

export interface JobResult {
  source: string;
  job: Job | null;
  diagnostics: AnalysisDiagnostic[];
  metadata: {
    version: string;
    timestamp: string;
  };
}

export class JobJsonFormatter {
  private readonly diagnostics: AnalysisDiagnostic[] = [];

  constructor(private readonly source: string) {}

  addDiagnostic(diagnostic: AnalysisDiagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  toResult(job: Job | null, timestamp: Date = new Date()): JobResult {
    return {
      source: this.source,
      job,
      diagnostics: [...this.diagnostics],
      metadata: {
        version: VERSION,
        timestamp: timestamp.toISOString(),
      },
    };
  }

  toJson(job: Job | null, timestamp?: Date): string {
    return JSON.stringify(this.toResult(job, timestamp), null, 2);
  }
}
