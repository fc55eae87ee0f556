import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { cosmiconfig, type CosmiconfigResult, type Loader } from 'cosmiconfig';
import { parseDocument } from 'yaml';

type NonNullableCosmiconfigResult = Exclude<CosmiconfigResult, null>;

export const DEFAULT_MANIFEST_FILES = Object.freeze([
  'partkit.yaml',
  'partkit.yml',
  'partkit.json',
  'partkit.config.mjs',
  'partkit.config.js',
  'partkit.config.cjs',
  'config/partkit.yaml',
] as const);

export interface ResolveConfigPathOptions {
  readonly cwd?: string;
  readonly configPath?: string;
  readonly candidates?: readonly string[];
}

export interface LoadConfigModuleOptions {
  readonly path: string;
  readonly cwd?: string;
}

export interface LoadedConfigModule<TConfig = unknown> {
  readonly path: string;
  readonly directory: string;
  readonly config: TConfig;
}

const MODULE_NAME = 'partkit';

const moduleLoader: Loader = async (filepath: string, _content: string) => {
  const importedModule: unknown = await import(pathToFileURL(filepath).href);
  if (!importedModule || typeof importedModule !== 'object') {
    return importedModule;
  }

  if ('default' in importedModule) {
    return importedModule.default;
  }
  if ('manifest' in importedModule) {
    return importedModule.manifest;
  }

  return importedModule;
};

/**
 * Mappings come back as `Map` instances so that declaration order survives, including keys that
 * look like integers and would be reordered on a plain object.
 */
const yamlLoader: Loader = (_filepath: string, content: string) => {
  const document = parseDocument(content);
  const [firstError] = document.errors;
  if (firstError) {
    throw firstError;
  }
  const parsed: unknown = document.toJS({ mapAsMap: true });
  return parsed ?? null;
};

function createExplorer(searchPlaces: readonly string[], stopDir: string) {
  return cosmiconfig(MODULE_NAME, {
    cache: false,
    searchPlaces: [...searchPlaces],
    stopDir,
    loaders: {
      '.json': yamlLoader,
      '.yaml': yamlLoader,
      '.yml': yamlLoader,
      '.js': moduleLoader,
      '.mjs': moduleLoader,
      '.cjs': moduleLoader,
    },
    transform: async (result: CosmiconfigResult) => (result ? transformResult(result) : result),
  });
}

/**
 * Determines the absolute path to a partkit manifest file.
 *
 * @param options - Overrides for the working directory, explicit path, or search candidates.
 * @returns The resolved manifest path.
 * @throws {Error} When the manifest cannot be found in the provided locations.
 */
export async function resolveConfigPath(options: ResolveConfigPathOptions = {}): Promise<string> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const searchPlaces = options.candidates ? [...options.candidates] : [...DEFAULT_MANIFEST_FILES];
  const explorer = createExplorer(searchPlaces, cwd);

  if (options.configPath) {
    const resolvedPath = path.resolve(cwd, options.configPath);
    try {
      const loaded = await explorer.load(resolvedPath);
      if (!loaded || loaded.isEmpty) {
        throw new Error(`Manifest file not found: ${options.configPath}`);
      }
      return loaded.filepath;
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new Error(`Manifest file not found: ${options.configPath}`);
      }
      throw error;
    }
  }

  const result = await explorer.search(cwd);
  if (!result || result.isEmpty) {
    throw new Error('Unable to locate a partkit manifest in the current directory.');
  }

  return result.filepath;
}

/**
 * Loads a manifest module, resolving any function or promise exports.
 *
 * @param options - Module loading options including the relative or absolute path.
 * @returns Loaded manifest metadata and the resolved value.
 */
export async function loadConfigModule<TConfig = unknown>(
  options: LoadConfigModuleOptions,
): Promise<LoadedConfigModule<TConfig>> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const resolvedPath = path.resolve(cwd, options.path);
  const explorer = createExplorer(DEFAULT_MANIFEST_FILES, path.dirname(resolvedPath));

  try {
    const result = await explorer.load(resolvedPath);
    if (!result || result.isEmpty) {
      throw new Error(`Manifest file not found at ${resolvedPath}`);
    }

    return {
      path: result.filepath,
      directory: path.dirname(result.filepath),
      config: result.config as TConfig,
    } satisfies LoadedConfigModule<TConfig>;
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new Error(`Manifest file not found at ${resolvedPath}`);
    }
    throw error;
  }
}

async function transformResult(
  result: NonNullableCosmiconfigResult,
): Promise<NonNullableCosmiconfigResult> {
  const resolvedConfig = await resolveExportedValue(result.config);
  return { ...result, config: resolvedConfig };
}

async function resolveExportedValue(candidate: unknown): Promise<unknown> {
  let value = candidate;

  for (;;) {
    if (typeof value === 'function') {
      value = (value as () => unknown)();
      continue;
    }

    if (value instanceof Promise) {
      value = await value;
      continue;
    }

    return value;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
