import type * as AssemblyModule from '@partkit/assembly';

import type { CliIo } from '../../io/cli-io.js';

export type LoadedAssemblyModule = typeof AssemblyModule;

type AssemblyModuleImporter = () => Promise<LoadedAssemblyModule>;

const importAssemblyPackage: AssemblyModuleImporter = () => import('@partkit/assembly');

let importer: AssemblyModuleImporter = importAssemblyPackage;
let assemblyModulePromise: Promise<LoadedAssemblyModule> | undefined;

export const loadAssemblyModule = async (io: CliIo): Promise<LoadedAssemblyModule | undefined> => {
  if (!assemblyModulePromise) {
    assemblyModulePromise = importer();
  }

  try {
    return await assemblyModulePromise;
  } catch (error) {
    assemblyModulePromise = undefined;

    if (isModuleNotFoundError(error)) {
      io.writeErr(
        'The "@partkit/assembly" package is required. Please install @partkit/assembly.\n',
      );
      return undefined;
    }

    throw error;
  }
};

/**
 * Replaces the dynamic import used by {@link loadAssemblyModule} and clears the cached module.
 * Passing nothing restores the package import.
 */
export const setAssemblyModuleImporterForTesting = (
  replacement?: AssemblyModuleImporter,
): void => {
  importer = replacement ?? importAssemblyPackage;
  assemblyModulePromise = undefined;
};

const isModuleNotFoundError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ERR_MODULE_NOT_FOUND';
