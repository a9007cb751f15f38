export const UPLOAD_STORE = Symbol('UPLOAD_STORE');
export const OUTPUT_STORE = Symbol('OUTPUT_STORE');

export interface StoredArtifact {
  key: string;
  size: number;
}

/**
 * Almacén de artefactos binarios direccionados por clave relativa
 * (por ejemplo `20260101_120000_ab12cd34_0_foto.png`).
 */
export interface ArtifactStore {
  readonly name: string;

  /**
   * Guarda el contenido bajo la clave indicada. El artefacto solo es visible
   * cuando está completo.
   * @throws ArtifactIOError si el almacenamiento falla.
   */
  save(key: string, content: Buffer): Promise<StoredArtifact>;

  /**
   * @throws ArtifactNotFoundError si la clave no existe.
   * @throws ArtifactIOError si el almacenamiento falla.
   */
  load(key: string): Promise<Buffer>;

  /** Elimina el artefacto; no falla si ya no existe. */
  delete(key: string): Promise<void>;

  exists(key: string): Promise<boolean>;
}
