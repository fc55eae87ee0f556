import type { PartDeclaration } from '../../config/index.js';
import type { OutputTree } from '../model/index.js';

/**
 * Supplies the already-built output tree of each part.
 */
export interface PartOutputRepositoryPort {
  /**
   * @throws {PartOutputNotFoundError} When the part has no build output.
   */
  load(part: PartDeclaration): Promise<OutputTree>;
}
