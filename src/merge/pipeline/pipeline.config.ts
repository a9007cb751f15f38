export const MERGE_PIPELINE_CONFIG = Symbol('MERGE_PIPELINE_CONFIG');

export interface MergePipelineConfig {
  /** Tiempo máximo por trabajo; al vencer el trabajo falla con limpieza completa. */
  jobTimeoutMs: number;
  /** Conversiones simultáneas dentro de un mismo trabajo. */
  conversionConcurrency: number;
}
