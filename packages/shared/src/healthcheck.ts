import { writeFile } from 'node:fs/promises';

export const DEFAULT_HEALTH_FILE = '/tmp/.tollgate-worker-healthy';

export async function touchHealthFile(path: string = DEFAULT_HEALTH_FILE): Promise<void> {
  await writeFile(path, new Date().toISOString(), 'utf-8');
}

/** Rewrites the health file on an interval so a container health check can read its age. */
export function startHealthBeat(opts: {
  intervalMs?: number;
  path?: string;
  onError: (err: unknown) => void;
}): { stop: () => void } {
  const tick = () => {
    touchHealthFile(opts.path).catch(opts.onError);
  };
  tick();
  const timer = setInterval(tick, opts.intervalMs ?? 5000);
  return {
    stop: () => clearInterval(timer),
  };
}
