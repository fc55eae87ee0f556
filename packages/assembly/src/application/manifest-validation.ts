import type { AssemblyManifest } from '../config/index.js';
import { ManifestError } from '../domain/errors.js';
import {
  compilePartRules,
  validateAppEnvironment,
  validateDaemonPolicy,
  type EnvironmentContractOptions,
} from '../domain/services/index.js';

export interface ManifestValidationSummary {
  readonly partCount: number;
  readonly appCount: number;
  readonly ruleCount: number;
  readonly daemonCount: number;
}

/**
 * Checks everything that can be verified without part outputs: unique part names, rule pattern
 * syntax, daemon restart policies and environment ordering.
 *
 * @throws {ManifestError | RuleError | DaemonPolicyError | EnvironmentOrderError}
 */
export function validateManifest(
  manifest: AssemblyManifest,
  options: EnvironmentContractOptions = {},
): ManifestValidationSummary {
  const seen = new Set<string>();
  let ruleCount = 0;

  for (const part of manifest.parts) {
    if (seen.has(part.name)) {
      throw new ManifestError(`Part "${part.name}" is declared more than once.`, [
        { path: `parts.${part.name}`, message: 'Duplicate part name.' },
      ]);
    }
    seen.add(part.name);
    const rules = compilePartRules(part);
    ruleCount += rules.stage.size + rules.organize.size;
  }

  for (const app of manifest.apps) {
    validateDaemonPolicy(app);
    validateAppEnvironment(app, options);
  }

  return {
    partCount: manifest.parts.length,
    appCount: manifest.apps.length,
    ruleCount,
    daemonCount: manifest.apps.filter((app) => app.daemon !== undefined).length,
  } satisfies ManifestValidationSummary;
}
