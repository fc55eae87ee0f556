export {
  DEFAULT_INSTALL_DIRECTORY,
  DEFAULT_PARTS_DIRECTORY,
  FileSystemPartOutputRepository,
  type FileSystemPartOutputRepositoryOptions,
} from './file-system-part-output-repository.js';
export { InMemoryPartOutputRepository } from './in-memory-part-output-repository.js';
