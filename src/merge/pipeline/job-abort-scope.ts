import {
  JobCancelledError,
  JobTimeoutError,
  MergeJobError,
} from '../../shared/errors/merge-job.errors';

/**
 * Combina la señal de cancelación del llamador con el tiempo máximo del
 * trabajo. `dispose` libera el temporizador y el listener.
 */
export class JobAbortScope {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly onExternalAbort: () => void;

  constructor(
    private readonly jobId: string,
    timeoutMs: number,
    private readonly external?: AbortSignal,
  ) {
    this.onExternalAbort = () => this.abort(new JobCancelledError(jobId));

    this.timer = setTimeout(() => this.abort(new JobTimeoutError(jobId, timeoutMs)), timeoutMs);
    this.timer.unref();

    if (external?.aborted) {
      this.onExternalAbort();
    } else {
      external?.addEventListener('abort', this.onExternalAbort, { once: true });
    }
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  get reason(): MergeJobError {
    const reason: unknown = this.controller.signal.reason;
    return reason instanceof MergeJobError ? reason : new JobCancelledError(this.jobId);
  }

  throwIfAborted(): void {
    if (this.aborted) throw this.reason;
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.external?.removeEventListener('abort', this.onExternalAbort);
  }

  private abort(reason: MergeJobError): void {
    if (!this.controller.signal.aborted) this.controller.abort(reason);
  }
}
