import type { Report } from '@vidtrend/analyzer';

export type RunStage = 'collection' | 'analysis' | 'persistence';

/** A run that could not finish, with whatever it had gathered by then */
export class RunStageError extends Error {
  readonly stage: RunStage;
  /** Merged records retained when the stage failed */
  readonly partialRecords: number;
  /** Set when analysis finished before the failure */
  readonly report?: Report;

  constructor(stage: RunStage, cause: unknown, partialRecords: number, report?: Report) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${stage} stage failed: ${reason}`, { cause });
    this.name = 'RunStageError';
    this.stage = stage;
    this.partialRecords = partialRecords;
    this.report = report;
  }
}
