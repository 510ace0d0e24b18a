import fs from 'fs';

export type KillFn = (pid: number, signal: NodeJS.Signals | 0) => void;

export const processKill: KillFn = (pid, signal) => {
  process.kill(pid, signal);
};

/** Pid recorded in the file, or null when there is none or it is unreadable. */
export function readPid(pidFile: string): number | null {
  if (!fs.existsSync(pidFile)) return null;
  const pid = Number.parseInt(fs.readFileSync(pidFile, 'utf8').trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

export function writePid(pidFile: string, pid: number): void {
  fs.writeFileSync(pidFile, `${pid}\n`, 'utf8');
}

export function removePid(pidFile: string): void {
  fs.rmSync(pidFile, { force: true });
}

/**
 * Signal 0 probes a pid without delivering anything. EPERM means the process
 * exists but belongs to someone else.
 */
export function isProcessAlive(pid: number, kill: KillFn = processKill): boolean {
  try {
    kill(pid, 0);
    return true;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EPERM') return true;
    return false;
  }
}
