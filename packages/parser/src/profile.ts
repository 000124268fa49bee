import { performance } from 'node:perf_hooks';

let profiling = process.env.MORPHOCHART_PROFILE === '1' || process.env.MORPHOCHART_PROFILE === 'true';

export function setProfiling(value: boolean): void {
  profiling = value;
}

export function isProfilingEnabled(): boolean {
  return profiling;
}

export function time<T>(label: string, fn: () => T): T {
  if (!profiling) return fn();
  const start = performance.now();
  try {
    return fn();
  } finally {
    const ms = performance.now() - start;
    console.log(`[PROFILE] ${label}: ${ms.toFixed(2)}ms`);
  }
}
