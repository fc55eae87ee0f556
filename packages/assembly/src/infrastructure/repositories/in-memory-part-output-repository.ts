import type { PartDeclaration } from '../../config/index.js';
import { PartOutputNotFoundError } from '../../domain/errors.js';
import { createOutputTree, type ContentHandle, type OutputTree } from '../../domain/model/index.js';
import type { PartOutputRepositoryPort } from '../../domain/ports/index.js';

/**
 * Serves output trees held in memory, keyed by part name.
 */
export class InMemoryPartOutputRepository implements PartOutputRepositoryPort {
  private readonly outputs: ReadonlyMap<string, OutputTree>;

  constructor(outputs: Iterable<readonly [string, OutputTree]>) {
    this.outputs = new Map(outputs);
  }

  /**
   * Builds a repository from file lists, giving each file a `memory://<part>/<path>` handle.
   */
  static fromFileLists(
    files: Readonly<Record<string, readonly string[]>>,
  ): InMemoryPartOutputRepository {
    return new InMemoryPartOutputRepository(
      Object.entries(files).map(([part, paths]): readonly [string, OutputTree] => [
        part,
        createOutputTree(
          paths.map((filePath): readonly [string, ContentHandle] => [
            filePath,
            { uri: `memory://${part}/${filePath}` },
          ]),
        ),
      ]),
    );
  }

  async load(part: PartDeclaration): Promise<OutputTree> {
    const tree = this.outputs.get(part.name);
    if (!tree) {
      throw new PartOutputNotFoundError(part.name, `memory://${part.name}`);
    }
    return tree;
  }
}
