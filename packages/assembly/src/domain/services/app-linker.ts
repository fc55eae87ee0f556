import { posix } from 'node:path';

import type { AppDeclaration } from '../../config/index.js';
import { MissingCommandError } from '../errors.js';
import type { MergedTree } from '../model/index.js';
import {
  validateAppEnvironment,
  validateDaemonPolicy,
  type EnvironmentContractOptions,
  type LinkedEnvironmentEntry,
} from './environment-contract.js';

export type LinkOptions = EnvironmentContractOptions;

export interface LinkedApp {
  readonly name: string;
  readonly command: string;
  readonly args: readonly string[];
  /** Part whose staged file provides the command. */
  readonly providedBy: string;
  readonly isDaemon: boolean;
  readonly daemonType?: string;
  readonly restartPolicy?: string;
  readonly environment: readonly LinkedEnvironmentEntry[];
}

/**
 * Cross-references declared apps against the merged tree and emits one descriptor per app, in
 * declaration order.
 *
 * @throws {MissingCommandError} When an app's command is not a file of the merged tree.
 * @throws {DaemonPolicyError} When a daemon app has no restart policy.
 * @throws {EnvironmentOrderError} When an app's environment is misordered or repeats a name.
 */
export function linkApps(
  tree: MergedTree,
  apps: readonly AppDeclaration[],
  options: LinkOptions = {},
): readonly LinkedApp[] {
  return Object.freeze(apps.map((app) => linkApp(tree, app, options)));
}

function linkApp(tree: MergedTree, app: AppDeclaration, options: LinkOptions): LinkedApp {
  const command = posix.normalize(app.command);
  const provider = tree.get(command);
  if (!provider) {
    throw new MissingCommandError(app.name, app.command);
  }

  validateDaemonPolicy(app);
  const environment = validateAppEnvironment(app, options);

  return Object.freeze({
    name: app.name,
    command,
    args: Object.freeze([...app.args]),
    providedBy: provider.part,
    isDaemon: app.daemon !== undefined,
    ...(app.daemon === undefined ? {} : { daemonType: app.daemon }),
    ...(app.restartPolicy === undefined ? {} : { restartPolicy: app.restartPolicy }),
    environment,
  }) satisfies LinkedApp;
}
