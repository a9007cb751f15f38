import { MergeJobError } from '../../shared/errors/merge-job.errors';

export type JobState =
  | { stage: 'received'; files: number }
  | { stage: 'converting'; index: number; name: string }
  | { stage: 'assembling'; documents: number }
  | { stage: 'done'; output: string }
  | { stage: 'failed'; error: MergeJobError };

export type JobStage = JobState['stage'];

const NEXT_STAGES: Record<JobStage, readonly JobStage[]> = {
  received: ['converting', 'failed'],
  converting: ['converting', 'assembling', 'failed'],
  assembling: ['done', 'failed'],
  done: [],
  failed: [],
};

export type JobStateListener = (jobId: string, state: JobState) => void;

/**
 * Un trabajo por solicitud de subida. Solo vive mientras dura la solicitud y
 * guarda, por índice de envío, la clave del PDF que aporta cada archivo.
 */
export class MergeJob {
  private current: JobState;
  private readonly documentKeys: Array<string | undefined>;

  constructor(
    readonly jobId: string,
    fileCount: number,
    private readonly listener?: JobStateListener,
  ) {
    this.documentKeys = new Array<string | undefined>(fileCount).fill(undefined);
    this.current = { stage: 'received', files: fileCount };
    this.listener?.(jobId, this.current);
  }

  get state(): JobState {
    return this.current;
  }

  get isFinished(): boolean {
    return this.current.stage === 'done' || this.current.stage === 'failed';
  }

  transition(next: JobState): void {
    if (!NEXT_STAGES[this.current.stage].includes(next.stage)) {
      throw new Error(`Transición inválida ${this.current.stage} -> ${next.stage} en ${this.jobId}`);
    }
    this.current = next;
    this.listener?.(this.jobId, next);
  }

  setDocument(index: number, key: string): void {
    this.documentKeys[index] = key;
  }

  /** Claves en orden de envío; falla si alguna conversión no terminó. */
  orderedDocuments(): string[] {
    return this.documentKeys.map((key, index) => {
      if (key === undefined) throw new Error(`Falta el documento #${index + 1} en ${this.jobId}`);
      return key;
    });
  }
}
