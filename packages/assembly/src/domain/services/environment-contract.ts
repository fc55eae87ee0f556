import type { AppDeclaration } from '../../config/index.js';
import { DaemonPolicyError, EnvironmentOrderError } from '../errors.js';

export const DEFAULT_SAVE_SUFFIXES = Object.freeze(['_ORIG']);

export interface LinkedEnvironmentEntry {
  readonly name: string;
  readonly value: string;
  /** Variables referenced by the value as `$NAME` or `${NAME}`, in order of first use. */
  readonly references: readonly string[];
}

export interface EnvironmentContractOptions {
  readonly saveSuffixes?: readonly string[];
}

const REFERENCE_PATTERN = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

export function parseEnvironmentReferences(value: string): readonly string[] {
  const names: string[] = [];
  for (const match of value.matchAll(REFERENCE_PATTERN)) {
    const name = match[1] ?? match[2];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Checks an app's environment list and annotates each entry with the variables it references.
 * A save entry (`X_ORIG` referencing `$X`) must come before any entry that redefines `X`.
 *
 * @throws {EnvironmentOrderError} On a repeated variable or a value overwritten before its save.
 */
export function validateAppEnvironment(
  app: Pick<AppDeclaration, 'name' | 'environment'>,
  options: EnvironmentContractOptions = {},
): readonly LinkedEnvironmentEntry[] {
  const suffixes = options.saveSuffixes ?? DEFAULT_SAVE_SUFFIXES;
  const positions = new Map<string, number>();

  for (const [position, entry] of app.environment.entries()) {
    if (positions.has(entry.name)) {
      throw new EnvironmentOrderError({
        app: app.name,
        reason: 'duplicate-variable',
        variable: entry.name,
        position,
      });
    }
    positions.set(entry.name, position);
  }

  return Object.freeze(
    app.environment.map((entry, position) => {
      const references = parseEnvironmentReferences(entry.value);
      for (const saved of savedVariables(entry.name, references, suffixes)) {
        const overwrittenAt = positions.get(saved);
        if (overwrittenAt !== undefined && overwrittenAt < position) {
          throw new EnvironmentOrderError({
            app: app.name,
            reason: 'overwritten-before-save',
            variable: saved,
            position: overwrittenAt,
            savedAs: entry.name,
            savePosition: position,
          });
        }
      }
      return Object.freeze({
        name: entry.name,
        value: entry.value,
        references: Object.freeze([...references]),
      });
    }),
  );
}

/**
 * @throws {DaemonPolicyError} When a daemon app declares no restart policy.
 */
export function validateDaemonPolicy(
  app: Pick<AppDeclaration, 'name' | 'daemon' | 'restartPolicy'>,
): void {
  if (app.daemon !== undefined && (app.restartPolicy ?? '').trim() === '') {
    throw new DaemonPolicyError(app.name, app.daemon);
  }
}

function savedVariables(
  name: string,
  references: readonly string[],
  suffixes: readonly string[],
): readonly string[] {
  return suffixes
    .filter((suffix) => suffix !== '' && name.length > suffix.length && name.endsWith(suffix))
    .map((suffix) => name.slice(0, -suffix.length))
    .filter((original) => references.includes(original));
}
