import { Logger } from '@nestjs/common';

export interface CleanupFailure {
  label: string;
  error: unknown;
}

type Disposer = () => Promise<void>;

/**
 * Pila de liberaciones registradas al crear cada recurso temporal. `dispose`
 * las ejecuta en orden inverso; un fallo se registra y no detiene al resto.
 */
export class CleanupStack {
  private readonly entries: Array<{ label: string; dispose: Disposer }> = [];

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.entries.length;
  }

  /**
   * Registra una liberación.
   * @returns función que libera el recurso de inmediato. Si falla, la entrada
   * queda en la pila para reintentarse en `dispose`.
   */
  defer(label: string, dispose: Disposer): () => Promise<void> {
    const entry = { label, dispose };
    this.entries.push(entry);

    return async () => {
      if (!this.entries.includes(entry)) return;
      await entry.dispose();
      const index = this.entries.indexOf(entry);
      if (index !== -1) this.entries.splice(index, 1);
    };
  }

  async dispose(): Promise<CleanupFailure[]> {
    const failures: CleanupFailure[] = [];

    while (this.entries.length) {
      const entry = this.entries.pop();
      if (!entry) break;
      try {
        await entry.dispose();
      } catch (error) {
        failures.push({ label: entry.label, error });
        this.logger.warn(`[cleanup] no se pudo liberar "${entry.label}": ${error}`);
      }
    }

    return failures;
  }
}
