export {
  APP_DESCRIPTOR_PATH,
  FileSystemTreeMaterializer,
  type FileSystemTreeMaterializerOptions,
} from './file-system-tree-materializer.js';
