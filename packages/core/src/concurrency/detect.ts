import { availableParallelism, cpus } from 'node:os';

/**
 * Environment variable capping the detected parallelism, useful on shared build hosts.
 */
export const PARALLELISM_ENV_VAR = 'PARTKIT_MAX_PARALLELISM';

/**
 * Detects the suggested level of parallelism for the current runtime.
 *
 * Prefers {@link availableParallelism}, falling back to the length of {@link cpus}, and never
 * returns less than 1. A positive integer in `PARTKIT_MAX_PARALLELISM` caps the result.
 *
 * @param env - Environment consulted for the parallelism cap.
 * @returns A positive integer indicating the recommended parallelism.
 */
export function detectParallelism(env: NodeJS.ProcessEnv = process.env): number {
  const detected = readAvailableParallelism() || readCpuCount() || 1;
  const cap = readParallelismCap(env);

  return cap === undefined ? detected : Math.min(detected, cap);
}

function readParallelismCap(env: NodeJS.ProcessEnv): number | undefined {
  const raw = env[PARALLELISM_ENV_VAR];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function readAvailableParallelism(): number {
  if (typeof availableParallelism !== 'function') {
    return 0;
  }

  try {
    const value = availableParallelism();

    if (Number.isFinite(value) && value > 0) {
      return Math.floor(value);
    }
  } catch {
    // Fall back to cpus().
  }

  return 0;
}

function readCpuCount(): number {
  try {
    const cpuList = cpus();

    if (Array.isArray(cpuList) && cpuList.length > 0) {
      return cpuList.length;
    }
  } catch {
    // Fall back to the minimum parallelism.
  }

  return 0;
}
